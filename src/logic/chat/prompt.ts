import { ChatMode } from '../../utils/types';

/** Retrieval query for a question typed in the given mode; general mode passes it through. */
export function composeQuery(mode: ChatMode, text: string): string {
    switch (mode) {
        case ChatMode.ADMISSION:
            return `Admission details for ${text}`;
        case ChatMode.SCHEDULE:
            return `Class schedule for ${text}`;
        case ChatMode.FEES:
            return `Fee details for ${text}`;
        case ChatMode.EXAM:
            return `Exam details for ${text}`;
        case ChatMode.GENERAL:
        case ChatMode.COMPLAINT:
            return text;
    }
}

// complaint mode opens the form instead of greeting
export function modeGreeting(mode: ChatMode, assistantName: string): string | null {
    switch (mode) {
        case ChatMode.GENERAL:
            return `👋 Hi! I'm ${assistantName} — Ask about admissions, fees, exams, or class schedules.`;
        case ChatMode.ADMISSION:
            return 'Which course are you looking for admission? (e.g., BCA, MBA, BSc)';
        case ChatMode.SCHEDULE:
            return 'For which course would you like to check the class schedule? (e.g., BA, BSc, MSc)';
        case ChatMode.FEES:
            return 'For which course would you like to check the fee details? (e.g., BA, BSc, MSc)';
        case ChatMode.EXAM:
            return 'For which course exam schedule or result details would you like to see?';
        case ChatMode.COMPLAINT:
            return null;
    }
}
