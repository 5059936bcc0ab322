// lib/generateDocx.ts

import mammoth from 'mammoth';
import PizZip from 'pizzip';

export const DOCX_MIME_TYPE = 'application/vnd.openxmlformats-officedocument.wordprocessingml.document';

/**
 * Escape XML special characters
 */
export function escapeXml(str: string): string {
  return str
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;')
    .replace(/"/g, '&quot;')
    .replace(/'/g, '&apos;');
}

const CONTENT_TYPES_XML = `<?xml version="1.0" encoding="UTF-8" standalone="yes"?>
<Types xmlns="http://schemas.openxmlformats.org/package/2006/content-types">
<Default Extension="rels" ContentType="application/vnd.openxmlformats-package.relationships+xml"/>
<Default Extension="xml" ContentType="application/xml"/>
<Override PartName="/word/document.xml" ContentType="application/vnd.openxmlformats-officedocument.wordprocessingml.document.main+xml"/>
</Types>`;

const ROOT_RELS_XML = `<?xml version="1.0" encoding="UTF-8" standalone="yes"?>
<Relationships xmlns="http://schemas.openxmlformats.org/package/2006/relationships">
<Relationship Id="rId1" Type="http://schemas.openxmlformats.org/officeDocument/2006/relationships/officeDocument" Target="word/document.xml"/>
</Relationships>`;

const DOCUMENT_RELS_XML = `<?xml version="1.0" encoding="UTF-8" standalone="yes"?>
<Relationships xmlns="http://schemas.openxmlformats.org/package/2006/relationships"></Relationships>`;

export function paragraphXml(line: string): string {
  if (!line) {
    return '<w:p/>';
  }
  return `<w:p><w:r><w:t xml:space="preserve">${escapeXml(line)}</w:t></w:r></w:p>`;
}

export function documentXml(content: string): string {
  const paragraphs = content.split(/\r?\n/).map(paragraphXml).join('');
  return (
    '<?xml version="1.0" encoding="UTF-8" standalone="yes"?>' +
    '<w:document xmlns:w="http://schemas.openxmlformats.org/wordprocessingml/2006/main">' +
    `<w:body>${paragraphs}</w:body>` +
    '</w:document>'
  );
}

/** Minimal WordprocessingML package with one paragraph per line of text. */
export function generateDocx(content: string): Buffer {
  const zip = new PizZip();
  zip.file('[Content_Types].xml', CONTENT_TYPES_XML);
  zip.file('_rels/.rels', ROOT_RELS_XML);
  zip.file('word/_rels/document.xml.rels', DOCUMENT_RELS_XML);
  zip.file('word/document.xml', documentXml(content));

  const buffer = zip.generate({ type: 'nodebuffer', compression: 'DEFLATE' });
  console.log('[generateDocx] Built document.xml package,', buffer.length, 'bytes');
  return buffer;
}

/** Plain text of an uploaded .docx, used as a template body. */
export async function extractDocxText(buffer: Buffer): Promise<string> {
  const result = await mammoth.extractRawText({ buffer });
  for (const message of result.messages) {
    console.warn('[generateDocx] mammoth:', message.message);
  }
  return result.value;
}

/** "Q3 Invoice / ACME" -> "Q3_Invoice_ACME.docx" */
export function docxFileName(title: string): string {
  const base = title.replace(/[^A-Za-z0-9 _-]+/g, '').trim().replace(/\s+/g, '_');
  return `${base || 'document'}.docx`;
}
