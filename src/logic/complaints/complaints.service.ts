import { ConflictException, Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { appendFile, mkdir, readFile, writeFile } from 'node:fs/promises';
import path from 'path';
import { stringify } from 'csv-stringify/sync';
import { z } from 'zod';
import { SessionService } from '../session/session.service';
import { toRenderModel } from '../chat/render-model';
import { AppEnv } from '../../utils/env';
import { formatTimestamp } from '../../utils/textNormalizer';
import { ChatMode, ComplaintCategory, ComplaintField, ComplaintRecord, RenderModel } from '../../utils/types';
import { SubmitComplaintDto } from './dto/submit-complaint.dto';

export const COMPLAINT_LOG_HEADER = ['Timestamp', 'Name', 'Contact', 'Category', 'Complaint'];

const COMPLAINT_FIELDS: ComplaintField[] = ['name', 'contact', 'category', 'complaint'];

const complaintSchema = z.object({
    name: z.string({ required_error: 'Name is required' }).trim().min(1, 'Name is required'),
    contact: z.string({ required_error: 'Contact number or email is required' }).trim().min(1, 'Contact number or email is required'),
    category: z.nativeEnum(ComplaintCategory, { errorMap: () => ({ message: 'Choose a complaint category' }) })
        .default(ComplaintCategory.ADMISSION),
    complaint: z.string({ required_error: 'Please describe your complaint' }).trim().min(1, 'Please describe your complaint'),
});

// fs errors may come from another realm, so match on the code alone
function isNotFound(error: unknown): boolean {
    return typeof error === 'object' && error !== null && 'code' in error && error.code === 'ENOENT';
}

@Injectable()
export class ComplaintsService {
    private readonly logger = new Logger(ComplaintsService.name);
    private writeQueue: Promise<void> = Promise.resolve();
    private readonly submitting = new Set<string>();

    constructor(
        private readonly sessionService: SessionService,
        private readonly configService: ConfigService<AppEnv, true>,
    ) { }

    async submit(sessionId: string, form: SubmitComplaintDto): Promise<RenderModel> {
        const session = this.sessionService.ensureSession(sessionId);
        const expired = this.sessionService.expireIfIdle(session);
        if (expired) {
            return toRenderModel(session, { notice: expired });
        }
        if (session.mode !== ChatMode.COMPLAINT) {
            throw new ConflictException('Open the complaint form before submitting a complaint.');
        }
        if (this.submitting.has(session.id)) {
            throw new ConflictException('This complaint is already being recorded.');
        }

        const parsed = complaintSchema.safeParse(form);
        if (!parsed.success) {
            const issues = parsed.error.flatten().fieldErrors;
            const fieldErrors: Partial<Record<ComplaintField, string>> = {};
            for (const field of COMPLAINT_FIELDS) {
                const message = issues[field]?.[0];
                if (message) fieldErrors[field] = message;
            }
            return toRenderModel(session, {
                notice: { level: 'warning', text: '⚠️ Please fill all required fields before submitting.' },
                fieldErrors,
            });
        }

        this.submitting.add(session.id);
        try {
            await this.saveComplaint({ timestamp: formatTimestamp(new Date()), ...parsed.data });
        } finally {
            this.submitting.delete(session.id);
        }
        this.sessionService.resetSession(session);

        return toRenderModel(session, {
            notice: {
                level: 'success',
                text: '✅ Your complaint has been recorded successfully. Our team will reach out soon.',
                dismissAfterMs: this.configService.get('COMPLAINT_NOTICE_DELAY_MS', { infer: true }),
            },
        });
    }

    /** Appends one row; writes from this process run one at a time. */
    saveComplaint(record: ComplaintRecord): Promise<void> {
        const write = this.writeQueue.then(() => this.appendRow(record));
        // the caller sees the failure through `write`; the queue itself must keep going
        this.writeQueue = write.catch(() => undefined);
        return write;
    }

    private get logPath(): string {
        return path.resolve(process.cwd(), this.configService.get('COMPLAINTS_LOG_PATH', { infer: true }));
    }

    private async appendRow(record: ComplaintRecord) {
        const logPath = this.logPath;
        const row = stringify([[record.timestamp, record.name, record.contact, record.category, record.complaint]]);

        let existing: string | null = null;
        try {
            existing = await readFile(logPath, 'utf8');
        } catch (error) {
            if (!isNotFound(error)) throw error;
        }

        if (!existing) {
            await mkdir(path.dirname(logPath), { recursive: true });
            await writeFile(logPath, stringify([COMPLAINT_LOG_HEADER]) + row, 'utf8');
        } else {
            const separator = existing.endsWith('\n') ? '' : '\n';
            await appendFile(logPath, separator + row, 'utf8');
        }
        this.logger.log(`Recorded a ${record.category} complaint in ${logPath}`);
    }
}
