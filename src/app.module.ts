import { Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import { ScheduleModule } from '@nestjs/schedule';
import { ServeStaticModule } from '@nestjs/serve-static';
import { resolve } from 'path';
import { validateEnv } from './utils/env';
import { GeminiModule } from './logic/gemini/gemini.module';
import { FaqModule } from './logic/faq/faq.module';
import { FaqIndexModule } from './logic/faq-index/faq-index.module';
import { AnswerModule } from './logic/answer/answer.module';
import { SessionModule } from './logic/session/session.module';
import { ChatModule } from './logic/chat/chat.module';
import { ComplaintsModule } from './logic/complaints/complaints.module';

@Module({
  imports: [
    ConfigModule.forRoot({ isGlobal: true, validate: validateEnv }),
    ScheduleModule.forRoot(),
    ServeStaticModule.forRoot({
      rootPath: resolve(__dirname, '..', 'public'), // chat page
      exclude: ['/chat/(.*)', '/complaints/(.*)', '/faq(.*)'],
    }),
    GeminiModule,
    FaqModule,
    FaqIndexModule,
    AnswerModule,
    SessionModule,
    ChatModule,
    ComplaintsModule,
  ],
})
export class AppModule {}
