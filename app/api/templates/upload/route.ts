// app/api/templates/upload/route.ts

import { NextRequest, NextResponse } from 'next/server';
import { extractDocxText } from '@/lib/generateDocx';
import { getServices } from '@/lib/services';
import { ACCEPTED_TEMPLATE_EXTENSIONS, MAX_TEMPLATE_FILE_BYTES } from '@/lib/validation';

function fileExtension(fileName: string): string {
  const dot = fileName.lastIndexOf('.');
  return dot === -1 ? '' : fileName.slice(dot + 1).toLowerCase();
}

function optionalField(formData: FormData, key: string): string | undefined {
  const value = formData.get(key);
  return typeof value === 'string' && value.trim() ? value.trim() : undefined;
}

/** POST /api/templates/upload: create a template from a .docx or text file */
export async function POST(request: NextRequest) {
  try {
    const formData = await request.formData();
    const file = formData.get('file');

    if (!file || typeof file === 'string') {
      return NextResponse.json({ error: 'No file uploaded' }, { status: 400 });
    }

    const extension = fileExtension(file.name);
    if (!(ACCEPTED_TEMPLATE_EXTENSIONS as readonly string[]).includes(extension)) {
      return NextResponse.json(
        { error: `Unsupported file type. Accepted: ${ACCEPTED_TEMPLATE_EXTENSIONS.join(', ')}` },
        { status: 400 }
      );
    }
    if (file.size > MAX_TEMPLATE_FILE_BYTES) {
      return NextResponse.json({ error: 'File too large' }, { status: 400 });
    }

    const buffer = Buffer.from(await file.arrayBuffer());
    const content = extension === 'docx' ? await extractDocxText(buffer) : buffer.toString('utf-8');

    if (!content.trim()) {
      return NextResponse.json({ error: 'Uploaded file has no text' }, { status: 400 });
    }

    const template = await getServices().templates.create({
      name: optionalField(formData, 'name') ?? file.name.replace(/\.[^.]+$/, ''),
      description: optionalField(formData, 'description') ?? null,
      category: optionalField(formData, 'category'),
      content,
    });

    console.log('[UPLOAD API] Created template', template.id, 'from', file.name);
    return NextResponse.json(template, { status: 201 });
  } catch (error) {
    console.error('Upload error:', error);
    return NextResponse.json({
      error: 'Failed to process template file',
      details: error instanceof Error ? error.message : 'Unknown error'
    }, { status: 500 });
  }
}
