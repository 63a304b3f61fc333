import { Module } from '@nestjs/common';
import { ChatService } from './chat.service';
import { ChatController } from './chat.controller';
import { SessionModule } from '../session/session.module';
import { FaqModule } from '../faq/faq.module';
import { FaqIndexModule } from '../faq-index/faq-index.module';
import { AnswerModule } from '../answer/answer.module';

@Module({
    imports: [
        SessionModule,
        FaqModule,
        FaqIndexModule,
        AnswerModule,
    ],
    controllers: [ChatController],
    providers: [ChatService],
    exports: [ChatService],
})
export class ChatModule {}
