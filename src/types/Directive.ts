import { Answers, GeneratedContent, TemplateId } from './Job';
import { DocumentType } from './User';

export interface InboundMessage {
    chatId: string;
    username?: string;
    /** Free text or a command token; both arrive on the same channel */
    text: string;
    messageId: string;
    attachmentRef?: string;
}

export type DocumentFormat = 'docx' | 'pdf';

export interface RenderRequest {
    jobId: string;
    chatId: string;
    docType: DocumentType;
    template: TemplateId;
    format: DocumentFormat;
    answers: Answers;
    generated: GeneratedContent;
}

export type MenuHint = 'documents';

export type ResponseDirective =
    | { kind: 'reply'; text: string; menu?: MenuHint }
    | { kind: 'render'; text: string; request: RenderRequest }
    | { kind: 'pdf'; request: RenderRequest }
    | { kind: 'noop' };
