import type { CategoryLabelDTO } from '../dto/CategoryLabelDTO.js';

export interface CategorizerPort {
  /** One label per description, in input order. */
  label(descriptions: string[]): Promise<CategoryLabelDTO[]>;
}
