import { IsEnum, IsString } from 'class-validator';
import { ChatMode } from '../../../utils/types';

export class SelectModeDto {
  @IsEnum(ChatMode)
  mode!: ChatMode;
}

export class AskDto {
  @IsString()
  text!: string;
}
