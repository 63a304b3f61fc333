import { ConflictException, Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { SessionService } from '../session/session.service';
import { FaqService } from '../faq/faq.service';
import { FaqIndexService } from '../faq-index/faq-index.service';
import { AnswerService } from '../answer/answer.service';
import { AppEnv } from '../../utils/env';
import { ChatMode, RenderModel } from '../../utils/types';
import { composeQuery, modeGreeting } from './prompt';
import { toRenderModel } from './render-model';

@Injectable()
export class ChatService {
    private readonly logger = new Logger(ChatService.name);
    private readonly assistantName: string;

    constructor(
        private readonly sessionService: SessionService,
        private readonly faqService: FaqService,
        private readonly faqIndexService: FaqIndexService,
        private readonly answerService: AnswerService,
        configService: ConfigService<AppEnv, true>,
    ) {
        this.assistantName = configService.get('ASSISTANT_NAME', { infer: true });
    }

    openSession(sessionId?: string): RenderModel {
        const session = this.sessionService.ensureSession(sessionId);
        const notice = this.sessionService.expireIfIdle(session);
        return toRenderModel(session, notice ? { notice } : {});
    }

    selectMode(sessionId: string, mode: ChatMode): RenderModel {
        const session = this.sessionService.ensureSession(sessionId);
        const notice = this.sessionService.expireIfIdle(session);
        if (notice) {
            return toRenderModel(session, { notice });
        }

        this.sessionService.resetSession(session);
        session.mode = mode;
        const greeting = modeGreeting(mode, this.assistantName);
        if (greeting) {
            session.messages.push({ role: 'bot', content: greeting });
        }
        return toRenderModel(session);
    }

    async ask(sessionId: string, text: string): Promise<RenderModel> {
        const session = this.sessionService.ensureSession(sessionId);
        const notice = this.sessionService.expireIfIdle(session);
        if (notice) {
            return toRenderModel(session, { notice });
        }
        if (session.mode === ChatMode.COMPLAINT) {
            throw new ConflictException('Questions are paused while the complaint form is open. Submit it or pick another menu option.');
        }
        if (!text.trim()) {
            return toRenderModel(session);
        }

        this.sessionService.touch(session);
        const history = session.messages;
        history.push({ role: 'user', content: text });

        const query = composeQuery(session.mode, text);
        const snapshot = await this.faqService.loadDocuments();
        const retriever = await this.faqIndexService.buildRetriever(snapshot);
        const answer = await this.answerService.run(retriever, query);

        // a reset while the answer was generated starts a new history; the reply belongs to the old one
        if (session.messages !== history) {
            this.logger.debug(`Dropped a late answer for session ${session.id}`);
            return toRenderModel(session);
        }
        history.push({ role: 'bot', content: answer });
        session.inputVersion += 1;
        return toRenderModel(session);
    }
}
