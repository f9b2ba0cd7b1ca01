import { AlignmentType, BorderStyle, Document, Packer, Paragraph, TextRun } from 'docx';
import PDFDocument from 'pdfkit';
import { RenderRequest } from '../types/Directive';
import { buildDocumentModel, buildFilename, DocumentBlock, TEMPLATE_STYLES, TemplateStyle } from './documentModel';

export interface RenderedDocument {
    filename: string;
    mimeType: string;
    content: Buffer;
}

export interface DocumentRenderer {
    render(request: RenderRequest): Promise<RenderedDocument>;
}

const DOCX_MIME = 'application/vnd.openxmlformats-officedocument.wordprocessingml.document';
const PDF_MIME = 'application/pdf';

// docx sizes are half-points
const docxParagraph = (block: DocumentBlock, style: TemplateStyle): Paragraph => {
    const run = (text: string, options: { bold?: boolean; size?: number; color?: string; italics?: boolean } = {}) =>
        new TextRun({ text, font: style.docxFont, size: options.size ?? 22, ...options });

    switch (block.kind) {
        case 'title':
            return new Paragraph({
                alignment: AlignmentType.CENTER,
                spacing: { after: 80 },
                children: [run(block.text, { bold: true, size: 36, color: style.accent })]
            });
        case 'subtitle':
            return new Paragraph({
                alignment: AlignmentType.CENTER,
                spacing: { after: 80 },
                children: [run(block.text, { size: 26, italics: true })]
            });
        case 'heading':
            return new Paragraph({
                spacing: { before: 240, after: 100 },
                border: { bottom: { color: style.accent, space: 1, style: BorderStyle.SINGLE, size: 6 } },
                children: [run(block.text.toUpperCase(), { bold: true, size: 24, color: style.accent })]
            });
        case 'entry':
            return new Paragraph({
                spacing: { before: 120, after: 40 },
                children: [run(block.title, { bold: true }), run(block.meta ? `  ${block.meta}` : '', { italics: true, size: 20 })]
            });
        case 'bullet':
            return new Paragraph({ bullet: { level: 0 }, children: [run(block.text)] });
        case 'paragraph':
            return new Paragraph({ spacing: { after: 120 }, children: [run(block.text)] });
    }
};

export const renderDocx = async (blocks: DocumentBlock[], style: TemplateStyle): Promise<Buffer> => {
    const doc = new Document({
        sections: [{ properties: {}, children: blocks.map(block => docxParagraph(block, style)) }]
    });
    return Packer.toBuffer(doc);
};

export const renderPdf = (blocks: DocumentBlock[], style: TemplateStyle): Promise<Buffer> => {
    return new Promise((resolve, reject) => {
        const doc = new PDFDocument({ margin: 50, size: 'A4' });
        const chunks: Buffer[] = [];

        doc.on('data', (chunk: Buffer) => chunks.push(chunk));
        doc.on('end', () => resolve(Buffer.concat(chunks)));
        doc.on('error', reject);

        const accent = `#${style.accent}`;
        for (const block of blocks) {
            switch (block.kind) {
                case 'title':
                    doc.font(style.pdfBoldFont).fontSize(20).fillColor(accent).text(block.text, { align: 'center' });
                    doc.moveDown(0.2);
                    break;
                case 'subtitle':
                    doc.font(style.pdfFont).fontSize(13).fillColor('black').text(block.text, { align: 'center' });
                    doc.moveDown(0.3);
                    break;
                case 'heading':
                    doc.moveDown(0.6);
                    doc.font(style.pdfBoldFont).fontSize(12).fillColor(accent).text(block.text.toUpperCase());
                    doc.moveDown(0.2);
                    break;
                case 'entry':
                    doc.moveDown(0.3);
                    doc.font(style.pdfBoldFont).fontSize(11).fillColor('black').text(block.title, { continued: Boolean(block.meta) });
                    if (block.meta) {
                        doc.font(style.pdfFont).fontSize(10).text(`  ${block.meta}`);
                    }
                    break;
                case 'bullet':
                    doc.font(style.pdfFont).fontSize(11).fillColor('black').text(`• ${block.text}`, { indent: 12 });
                    break;
                case 'paragraph':
                    doc.font(style.pdfFont).fontSize(11).fillColor('black').text(block.text);
                    doc.moveDown(0.4);
                    break;
            }
        }

        doc.end();
    });
};

/** Writes DOCX with `docx` and PDF with `pdfkit` from the same block model */
export class DocxPdfRenderer implements DocumentRenderer {
    async render(request: RenderRequest): Promise<RenderedDocument> {
        const blocks = buildDocumentModel(request);
        const style = TEMPLATE_STYLES[request.template];
        const name = request.answers.basics?.name;

        if (request.format === 'pdf') {
            return {
                filename: buildFilename(name, request.docType, 'pdf'),
                mimeType: PDF_MIME,
                content: await renderPdf(blocks, style)
            };
        }

        return {
            filename: buildFilename(name, request.docType, 'docx'),
            mimeType: DOCX_MIME,
            content: await renderDocx(blocks, style)
        };
    }
}
