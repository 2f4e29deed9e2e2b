export interface UploadedFileDTO {
  filename: string;
  mimeType: string;
  content: Buffer;
}

export type RenderedPageDTO =
  | { index: number; kind: 'text'; text: string }
  | { index: number; kind: 'image'; mimeType: string; data: Buffer };
