export enum ChatMode {
    GENERAL = 'general',
    ADMISSION = 'admission',
    SCHEDULE = 'schedule',
    FEES = 'fees',
    EXAM = 'exam',
    COMPLAINT = 'complaint',
}

export enum ComplaintCategory {
    ADMISSION = 'Admission',
    FEES = 'Fees',
    EXAM = 'Exam',
    FACILITIES = 'Facilities',
    OTHER = 'Other',
}

export type MessageRole = 'user' | 'bot';

export interface ChatMessage {
    role: MessageRole;
    content: string;
}

export interface SessionState {
    id: string;
    mode: ChatMode;
    messages: ChatMessage[];
    inputVersion: number;     // bumped to hand the client a fresh, empty input
    lastActivity: number;     // epoch ms
    createdAt: number;
}

export interface ComplaintRecord {
    timestamp: string;        // YYYY-MM-DD HH:MM:SS, local time
    name: string;
    contact: string;
    category: ComplaintCategory;
    complaint: string;
}

export type NoticeLevel = 'info' | 'success' | 'warning' | 'error';

export interface Notice {
    level: NoticeLevel;
    text: string;
    dismissAfterMs?: number;
}

export interface MenuItem {
    mode: ChatMode;
    label: string;
}

export type ComplaintField = 'name' | 'contact' | 'category' | 'complaint';

export interface RenderModel {
    sessionId: string;
    mode: ChatMode;
    messages: ChatMessage[];
    inputVersion: number;
    showComplaintForm: boolean;
    complaintCategories: ComplaintCategory[];
    menu: MenuItem[];
    notice?: Notice;
    fieldErrors?: Partial<Record<ComplaintField, string>>;
}

export interface FaqColumns {
    question: string;
    answer: string;
    category: string | null;
    all: string[];
}

export interface FaqSnapshot {
    documents: string[];
    columns: FaqColumns;
    loadedAt: number;
    fingerprint: string;
}
