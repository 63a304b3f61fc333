import { ChatMode, ComplaintCategory, MenuItem, RenderModel, SessionState } from '../../utils/types';

export const MENU: MenuItem[] = [
    { mode: ChatMode.GENERAL, label: '🏠 Home' },
    { mode: ChatMode.ADMISSION, label: '🎯 Admissions' },
    { mode: ChatMode.SCHEDULE, label: '📚 Class Schedule' },
    { mode: ChatMode.FEES, label: '💰 Fees' },
    { mode: ChatMode.EXAM, label: '🧾 Exams' },
    { mode: ChatMode.COMPLAINT, label: '📝 Lodge Complaint' },
];

export function toRenderModel(
    session: SessionState,
    extras: Partial<Pick<RenderModel, 'notice' | 'fieldErrors'>> = {},
): RenderModel {
    return {
        sessionId: session.id,
        mode: session.mode,
        messages: session.messages.map(m => ({ ...m })),
        inputVersion: session.inputVersion,
        showComplaintForm: session.mode === ChatMode.COMPLAINT,
        complaintCategories: Object.values(ComplaintCategory),
        menu: MENU,
        ...extras,
    };
}
