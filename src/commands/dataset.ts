import { readFile } from "node:fs/promises";
import { parseDataFileDetailed } from "@/features/dataset/parser";
import type { ParseResult } from "@/features/dataset/parser";

export const readDataFile = async (path: string): Promise<ParseResult> => {
  const text = await readFile(path, "utf-8");
  return parseDataFileDetailed(text);
};
