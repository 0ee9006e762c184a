/**
 * Loads the JSON lookup tables shipped in `data/`.
 */

import { readFileSync } from "node:fs";
import type { z } from "zod";

const DATA_DIR = new URL("../../data/", import.meta.url);

export function loadDataFile<S extends z.ZodTypeAny>(name: string, schema: S): z.infer<S> {
  const raw = readFileSync(new URL(name, DATA_DIR), "utf-8");
  const parsed = schema.safeParse(JSON.parse(raw));
  if (!parsed.success) {
    throw new Error(`data/${name} is invalid: ${parsed.error.message}`);
  }
  return parsed.data;
}
