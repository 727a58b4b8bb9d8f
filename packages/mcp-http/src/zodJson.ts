import type { z } from "zod";
import { zodToJsonSchema } from "zod-to-json-schema";

export function toJSONSchema(schema: z.ZodTypeAny) {
  return zodToJsonSchema(schema, { $refStrategy: "none" });
}
