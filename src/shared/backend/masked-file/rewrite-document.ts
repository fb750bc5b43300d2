import JSZip from 'jszip';
import { describeError, ExtractionError } from 'src/shared/backend/extraction';

/** Body, headers, footers and notes all hold paragraphs that may carry PII. */
const TEXT_PARTS = /^word\/(?:document|header\d*|footer\d*|footnotes|endnotes)\.xml$/;

// Innermost paragraphs only: a text box paragraph nested in another is handled on its own.
const PARAGRAPH = /<w:p(?:\s[^>]*)?(?<!\/)>(?:(?!<w:p[\s>])[\s\S])*?<\/w:p>/g;
const TEXT_RUN = /(<w:t(?:\s[^>]*)?(?<!\/)>)([\s\S]*?)(<\/w:t>)/g;

const XML_ENTITIES: Readonly<Record<string, string>> = Object.freeze({
    amp: '&',
    lt: '<',
    gt: '>',
    quot: '"',
    apos: "'",
});

function decodeXml(text: string): string {
    return text.replace(/&(#x[0-9a-fA-F]+|#\d+|[a-z]+);/g, (entity: string, name: string) => {
        if (name.startsWith('#x')) return String.fromCodePoint(parseInt(name.slice(2), 16));
        if (name.startsWith('#')) return String.fromCodePoint(parseInt(name.slice(1), 10));
        return XML_ENTITIES[name] ?? entity;
    });
}

function encodeXml(text: string): string {
    return text.replace(/&/g, '&amp;').replace(/</g, '&lt;').replace(/>/g, '&gt;');
}

/**
 * Mask one `<w:p>` element. The paragraph text is the concatenation of its `<w:t>` runs;
 * when masking changes it, the first run takes the whole masked text and the others are emptied,
 * so paragraph and first-run formatting survive.
 */
function maskParagraph(paragraph: string, maskText: (text: string) => string): string | null {
    const runs = [...paragraph.matchAll(TEXT_RUN)];
    if (runs.length === 0) return null;

    const text = runs.map((run) => decodeXml(run[2] ?? '')).join('');
    const masked = maskText(text);
    if (masked === text) return null;

    let index = 0;
    return paragraph.replace(TEXT_RUN, (_run: string, open: string, _body: string, close: string) => {
        const first = index === 0;
        index += 1;
        if (!first) return `${open}${close}`;
        const preserved = open.includes('xml:space=') ? open : open.replace(/^<w:t/, '<w:t xml:space="preserve"');
        return `${preserved}${encodeXml(masked)}${close}`;
    });
}

/**
 * Re-open a Word package and mask every paragraph, table cells included,
 * writing the rest of the package back untouched.
 */
export async function rewriteDocument(
    source: Buffer,
    maskText: (text: string) => string,
): Promise<{ content: Buffer; paragraphsMasked: number }> {
    let zip: JSZip;
    try {
        zip = await JSZip.loadAsync(source);
    } catch (error) {
        throw new ExtractionError('docx', describeError(error));
    }

    const parts = Object.keys(zip.files).filter((name) => TEXT_PARTS.test(name));
    if (!parts.includes('word/document.xml')) {
        throw new ExtractionError('docx', 'missing word/document.xml');
    }

    let paragraphsMasked = 0;
    for (const name of parts) {
        const part = zip.file(name);
        if (!part) continue;

        const xml = await part.async('string');
        const rewritten = xml.replace(PARAGRAPH, (paragraph: string) => {
            const masked = maskParagraph(paragraph, maskText);
            if (masked === null) return paragraph;
            paragraphsMasked += 1;
            return masked;
        });
        if (rewritten !== xml) {
            zip.file(name, rewritten);
        }
    }

    const content = await zip.generateAsync({ type: 'nodebuffer', compression: 'DEFLATE' });
    return { content, paragraphsMasked };
}
