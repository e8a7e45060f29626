import { z } from 'zod';

/** One row of `pragma_table_info` */
export const tableInfoRowSchema = z.object({
  name: z.string(),
  type: z.string(),
  notnull: z.number(),
  pk: z.number(),
});

export type TableInfoRow = z.infer<typeof tableInfoRowSchema>;
