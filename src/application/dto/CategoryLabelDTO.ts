import { z } from 'zod';

export const CategoryLabelSchema = z.object({
  category: z.string(),
  subcategory: z.string().nullable().optional(),
});

export type CategoryLabelDTO = z.infer<typeof CategoryLabelSchema>;
