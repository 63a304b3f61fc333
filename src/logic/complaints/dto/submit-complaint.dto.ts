import { IsEnum, IsOptional, IsString } from 'class-validator';
import { ComplaintCategory } from '../../../utils/types';

// Emptiness is checked by ComplaintsService so the form can report it inline.
export class SubmitComplaintDto {
  @IsOptional()
  @IsString()
  name?: string;

  @IsOptional()
  @IsString()
  contact?: string;

  @IsOptional()
  @IsEnum(ComplaintCategory)
  category?: ComplaintCategory;

  @IsOptional()
  @IsString()
  complaint?: string;
}
