import { z } from "zod";

export type JsonValue =
  | string
  | number
  | boolean
  | null
  | JsonValue[]
  | { [key: string]: JsonValue };

export type JsonObject = { [key: string]: JsonValue };

// Clients often send numbers as strings, and flags as booleans
function lenientNumber() {
  return z.union([
    z.number(),
    z.string().regex(/^\d+$/, "Expected an integer").transform(Number),
    z.boolean().transform((value) => (value ? 1 : 0)),
  ]);
}

const flag = lenientNumber().pipe(z.number().int().min(0).max(1));
const positiveInt = lenientNumber().pipe(z.number().int().positive());

export const searchParamsSchema = z.object({
  q: z
    .string()
    .min(1)
    .describe("Search words. Words are combined with AND; natural-language queries are not supported"),
  only_title: flag.default(0).describe("1 to match titles only, 0 for full text (default: 0)"),
  include_archived: flag.default(0).describe("1 to include archived pages (default: 0)"),
  note_code: z.string().nullish().describe("Restrict results to one note"),
  tag_name: z.string().nullish().describe("Restrict results to pages with this tag"),
  created: z.string().nullish().describe("Restrict results by creation date"),
  page: positiveInt.default(1).describe("Result page number (default: 1)"),
  per_page: positiveInt.default(10).describe("Results per page (default: 10)"),
});

export const detailParamsSchema = z.object({
  page_code: z.string().min(1).describe("Page code of the page to retrieve"),
});

export type SearchParams = z.infer<typeof searchParamsSchema>;
export type DetailParams = z.infer<typeof detailParamsSchema>;
