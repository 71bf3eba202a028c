import fs from "fs/promises";
import path from "path";
import { ConfigError, parseGlossary, type Glossary, type OptionalLogger } from "@caption-sync/core";
import { fileExists } from "./file";

/** Loads a `.json` glossary, or a `from=to` text glossary for any other extension. */
export const loadGlossaryFile = async (
  filePath: string,
  logger?: OptionalLogger
): Promise<Glossary> => {
  if (!(await fileExists(filePath))) {
    throw new ConfigError(`Glossary file not found: ${filePath}`);
  }

  const content = await fs.readFile(filePath, "utf8");
  const format = path.extname(filePath).toLowerCase() === ".json" ? "json" : "text";
  const glossary = parseGlossary(content, format, logger);
  logger?.info?.(`[Glossary] Loaded ${glossary.size} term(s) from ${filePath}`);
  return glossary;
};
