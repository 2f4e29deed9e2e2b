import { PDFParse } from 'pdf-parse';
import type { RenderedPageDTO, UploadedFileDTO } from '../../../application/dto/UploadedFileDTO.js';
import type { DocumentRendererPort } from '../../../application/ports/DocumentRendererPort.js';

const IMAGE_TYPES: Record<string, string> = {
  '.jpg': 'image/jpeg',
  '.jpeg': 'image/jpeg',
  '.png': 'image/png',
};

export const resolveMimeType = (file: Pick<UploadedFileDTO, 'filename' | 'mimeType'>): string | null => {
  if (file.mimeType === 'application/pdf' || Object.values(IMAGE_TYPES).includes(file.mimeType)) {
    return file.mimeType;
  }

  const name = file.filename.toLowerCase();
  if (name.endsWith('.pdf')) {
    return 'application/pdf';
  }

  const extension = Object.keys(IMAGE_TYPES).find((ext) => name.endsWith(ext));
  return extension ? IMAGE_TYPES[extension] ?? null : null;
};

export class PdfPageRenderer implements DocumentRendererPort {
  async render(file: UploadedFileDTO, options: { password?: string } = {}): Promise<RenderedPageDTO[]> {
    const mimeType = resolveMimeType(file);

    if (!mimeType) {
      throw new Error(`Unsupported file type for ${file.filename}; upload a PDF, JPEG or PNG`);
    }

    // Photos and scans carry a single page and no password.
    if (mimeType !== 'application/pdf') {
      return [{ index: 0, kind: 'image', mimeType, data: file.content }];
    }

    const parser = new PDFParse({ data: new Uint8Array(file.content), password: options.password || undefined });
    try {
      const result = await parser.getText();
      return result.pages.map((page, position) => ({
        index: position,
        kind: 'text' as const,
        text: page.text,
      }));
    } catch (error) {
      const reason = error instanceof Error ? error.message : 'Unknown error';
      if (/password/i.test(reason)) {
        throw new Error(
          options.password ? 'The PDF password is incorrect' : 'The PDF is password protected; supply its password',
        );
      }
      throw new Error(`Failed to read PDF: ${reason}`);
    } finally {
      await parser.destroy();
    }
  }
}
