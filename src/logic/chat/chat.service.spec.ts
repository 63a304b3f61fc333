import { Test, TestingModule } from '@nestjs/testing';
import { ConfigService } from '@nestjs/config';
import { ConflictException } from '@nestjs/common';
import { ChatService } from './chat.service';
import { SessionService } from '../session/session.service';
import { FaqService } from '../faq/faq.service';
import { FaqIndexService } from '../faq-index/faq-index.service';
import { AnswerService } from '../answer/answer.service';
import { FaqSchemaError } from '../faq/errors';
import { Retriever } from '../faq-index/vector-index';
import { ChatMode, FaqSnapshot } from '../../utils/types';
import { createTestConfig } from '../../testing/test-config';

const SNAPSHOT: FaqSnapshot = {
  documents: ['Category: Admissions\nQ: Is BCA offered?\nA: Yes.'],
  columns: { question: 'question', answer: 'answer', category: 'category', all: ['category', 'question', 'answer'] },
  loadedAt: 0,
  fingerprint: 'fp',
};

describe('ChatService', () => {
  let service: ChatService;
  let loadDocuments: jest.Mock<Promise<FaqSnapshot>, []>;
  let buildRetriever: jest.Mock<Promise<Retriever>, [FaqSnapshot]>;
  let run: jest.Mock<Promise<string>, [Retriever, string]>;
  const retriever: Retriever = { retrieve: async () => SNAPSHOT.documents };

  beforeEach(async () => {
    loadDocuments = jest.fn(async () => SNAPSHOT);
    buildRetriever = jest.fn(async (_snapshot: FaqSnapshot) => retriever);
    run = jest.fn(async (_retriever: Retriever, query: string) => `answer to "${query}"`);

    const module: TestingModule = await Test.createTestingModule({
      providers: [
        ChatService,
        SessionService,
        { provide: FaqService, useValue: { loadDocuments } },
        { provide: FaqIndexService, useValue: { buildRetriever } },
        { provide: AnswerService, useValue: { run } },
        { provide: ConfigService, useValue: createTestConfig({ ASSISTANT_NAME: 'Asha' }) },
      ],
    }).compile();

    service = module.get<ChatService>(ChatService);
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  it('should be defined', () => {
    expect(service).toBeDefined();
  });

  it('opens a general-mode session with the full menu', () => {
    const view = service.openSession();

    expect(view.mode).toBe(ChatMode.GENERAL);
    expect(view.messages).toEqual([]);
    expect(view.showComplaintForm).toBe(false);
    expect(view.menu.map(m => m.label)).toEqual([
      '🏠 Home', '🎯 Admissions', '📚 Class Schedule', '💰 Fees', '🧾 Exams', '📝 Lodge Complaint',
    ]);
    expect(view.complaintCategories).toEqual(['Admission', 'Fees', 'Exam', 'Facilities', 'Other']);
  });

  it('greets by name when going Home', () => {
    const { sessionId } = service.openSession();

    const view = service.selectMode(sessionId, ChatMode.GENERAL);

    expect(view.messages).toEqual([
      { role: 'bot', content: "👋 Hi! I'm Asha — Ask about admissions, fees, exams, or class schedules." },
    ]);
  });

  it('clears earlier history and mode when another menu item is picked', async () => {
    const { sessionId } = service.openSession();
    service.selectMode(sessionId, ChatMode.ADMISSION);
    await service.ask(sessionId, 'BCA');

    const view = service.selectMode(sessionId, ChatMode.FEES);

    expect(view.mode).toBe(ChatMode.FEES);
    expect(view.messages).toEqual([
      { role: 'bot', content: 'For which course would you like to check the fee details? (e.g., BA, BSc, MSc)' },
    ]);
  });

  it('opens the complaint form without a greeting', () => {
    const { sessionId } = service.openSession();
    service.selectMode(sessionId, ChatMode.EXAM);

    const view = service.selectMode(sessionId, ChatMode.COMPLAINT);

    expect(view.mode).toBe(ChatMode.COMPLAINT);
    expect(view.showComplaintForm).toBe(true);
    expect(view.messages).toEqual([]);
  });

  it('prefixes the query in admission mode and records both turns', async () => {
    const { sessionId } = service.openSession();
    service.selectMode(sessionId, ChatMode.ADMISSION);

    const view = await service.ask(sessionId, 'BCA');

    expect(run).toHaveBeenCalledWith(retriever, 'Admission details for BCA');
    expect(buildRetriever).toHaveBeenCalledWith(SNAPSHOT);
    expect(view.messages).toEqual([
      { role: 'bot', content: 'Which course are you looking for admission? (e.g., BCA, MBA, BSc)' },
      { role: 'user', content: 'BCA' },
      { role: 'bot', content: 'answer to "Admission details for BCA"' },
    ]);
    expect(view.inputVersion).toBe(2);
  });

  it('sends the raw text in general mode', async () => {
    const { sessionId } = service.openSession();

    await service.ask(sessionId, 'BCA');

    expect(run).toHaveBeenCalledWith(retriever, 'BCA');
  });

  it.each<{ mode: ChatMode; expected: string }>([
    { mode: ChatMode.SCHEDULE, expected: 'Class schedule for MSc' },
    { mode: ChatMode.FEES, expected: 'Fee details for MSc' },
    { mode: ChatMode.EXAM, expected: 'Exam details for MSc' },
  ])('composes the $mode query', async ({ mode, expected }) => {
    const { sessionId } = service.openSession();
    service.selectMode(sessionId, mode);

    await service.ask(sessionId, 'MSc');

    expect(run).toHaveBeenCalledWith(retriever, expected);
  });

  it('refuses free-text questions while the complaint form is open', async () => {
    const { sessionId } = service.openSession();
    service.selectMode(sessionId, ChatMode.COMPLAINT);

    await expect(service.ask(sessionId, 'BCA')).rejects.toBeInstanceOf(ConflictException);
    expect(service.openSession(sessionId).messages).toEqual([]);
    expect(loadDocuments).not.toHaveBeenCalled();
  });

  it('ignores blank input', async () => {
    const { sessionId } = service.openSession();

    const view = await service.ask(sessionId, '   ');

    expect(view.messages).toEqual([]);
    expect(loadDocuments).not.toHaveBeenCalled();
  });

  it('keeps the question but adds no reply when the FAQ cannot be loaded', async () => {
    loadDocuments.mockRejectedValueOnce(new FaqSchemaError(['topic', 'notes']));
    const { sessionId } = service.openSession();

    await expect(service.ask(sessionId, 'BCA')).rejects.toBeInstanceOf(FaqSchemaError);

    expect(service.openSession(sessionId).messages).toEqual([{ role: 'user', content: 'BCA' }]);
    expect(run).not.toHaveBeenCalled();
  });

  it('expires an idle session before handling the next question', async () => {
    const start = 1_700_000_000_000;
    const now = jest.spyOn(Date, 'now').mockReturnValue(start);
    const { sessionId } = service.openSession();
    service.selectMode(sessionId, ChatMode.ADMISSION);
    await service.ask(sessionId, 'BCA');

    now.mockReturnValue(start + 11 * 60_000);
    const view = await service.ask(sessionId, 'MBA');

    expect(view.notice).toEqual({
      level: 'warning',
      text: '⏳ Session expired due to 10 minutes of inactivity. Starting a new chat.',
    });
    expect(view.mode).toBe(ChatMode.GENERAL);
    expect(view.messages).toEqual([]);
    expect(view.inputVersion).toBe(3);
    expect(run).toHaveBeenCalledTimes(1);
  });

  it('does not expire a session whose last question was under ten minutes ago', async () => {
    const start = 1_700_000_000_000;
    const now = jest.spyOn(Date, 'now').mockReturnValue(start);
    const { sessionId } = service.openSession();
    await service.ask(sessionId, 'BCA');

    now.mockReturnValue(start + 9 * 60_000);
    const view = await service.ask(sessionId, 'MBA');

    expect(view.notice).toBeUndefined();
    expect(view.messages).toHaveLength(4);
  });

  it('does not count reopening the page as activity', async () => {
    const start = 1_700_000_000_000;
    const now = jest.spyOn(Date, 'now').mockReturnValue(start);
    const { sessionId } = service.openSession();
    await service.ask(sessionId, 'BCA');

    now.mockReturnValue(start + 6 * 60_000);
    service.openSession(sessionId);
    now.mockReturnValue(start + 11 * 60_000);
    const view = await service.ask(sessionId, 'MBA');

    expect(view.notice?.text).toBe('⏳ Session expired due to 10 minutes of inactivity. Starting a new chat.');
    expect(view.messages).toEqual([]);
    expect(run).toHaveBeenCalledTimes(1);
  });

  it('discards a menu selection made after the session expired', () => {
    const start = 1_700_000_000_000;
    const now = jest.spyOn(Date, 'now').mockReturnValue(start);
    const { sessionId } = service.openSession();
    service.selectMode(sessionId, ChatMode.EXAM);

    now.mockReturnValue(start + 11 * 60_000);
    const view = service.selectMode(sessionId, ChatMode.FEES);

    expect(view.notice).toEqual({
      level: 'warning',
      text: '⏳ Session expired due to 10 minutes of inactivity. Starting a new chat.',
    });
    expect(view.mode).toBe(ChatMode.GENERAL);
    expect(view.messages).toEqual([]);
  });

  it('drops an answer that arrives after the session was reset', async () => {
    const { sessionId } = service.openSession();
    run.mockImplementationOnce(async () => {
      service.selectMode(sessionId, ChatMode.FEES);
      return 'late answer';
    });

    const view = await service.ask(sessionId, 'BCA');

    expect(view.mode).toBe(ChatMode.FEES);
    expect(view.messages).toEqual([
      { role: 'bot', content: 'For which course would you like to check the fee details? (e.g., BA, BSc, MSc)' },
    ]);
  });
});
