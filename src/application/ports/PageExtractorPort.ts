import type { ExtractedPageDTO } from '../dto/ExtractedPageDTO.js';
import type { RenderedPageDTO } from '../dto/UploadedFileDTO.js';

export interface PageExtractorPort {
  isAvailable(): boolean;
  extract(page: RenderedPageDTO): Promise<ExtractedPageDTO>;
}
