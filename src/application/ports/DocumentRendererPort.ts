import type { RenderedPageDTO, UploadedFileDTO } from '../dto/UploadedFileDTO.js';

export interface DocumentRendererPort {
  render(file: UploadedFileDTO, options?: { password?: string }): Promise<RenderedPageDTO[]>;
}
