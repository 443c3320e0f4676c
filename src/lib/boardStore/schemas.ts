import { z } from "zod";

export const GraphqlEnvelopeSchema = z.object({
  data: z.unknown().optional(),
  errors: z.array(z.object({ message: z.string() }).passthrough()).optional(),
  error_message: z.string().optional(),
});

export const ColumnValueSchema = z.object({
  id: z.string(),
  text: z.string().nullable().optional(),
  value: z.string().nullable().optional(),
  type: z.string().optional(),
});

export const ItemSchema = z.object({
  id: z.union([z.string(), z.number()]).transform(String),
  name: z.string().nullable().optional(),
  column_values: z.array(ColumnValueSchema).optional(),
});

export const BoardsDataSchema = z.object({
  boards: z
    .array(
      z.object({
        items_page: z
          .object({ items: z.array(ItemSchema).nullable().optional() })
          .nullable()
          .optional(),
      }),
    )
    .nullable()
    .optional(),
});

export const ChangeColumnValuesDataSchema = z.object({
  change_multiple_column_values: z
    .object({ id: z.union([z.string(), z.number()]).transform(String) })
    .nullable(),
});

export type ItemPayload = z.infer<typeof ItemSchema>;
