import { Body, Controller, Get, HttpCode, HttpStatus, Param, Post } from '@nestjs/common';
import { ChatService } from './chat.service';
import { AskDto, SelectModeDto } from './dto/chat.dto';

@Controller('chat')
export class ChatController {

    constructor(private readonly chatService: ChatService) {}

    @Post('sessions')
    openSession() {
        return this.chatService.openSession();
    }

    @Get('sessions/:sessionId')
    getSession(@Param('sessionId') sessionId: string) {
        return this.chatService.openSession(sessionId);
    }

    @Post('sessions/:sessionId/mode')
    @HttpCode(HttpStatus.OK)
    selectMode(@Param('sessionId') sessionId: string, @Body() body: SelectModeDto) {
        return this.chatService.selectMode(sessionId, body.mode);
    }

    @Post('sessions/:sessionId/messages')
    @HttpCode(HttpStatus.OK)
    async ask(@Param('sessionId') sessionId: string, @Body() body: AskDto) {
        return this.chatService.ask(sessionId, body.text);
    }
}
