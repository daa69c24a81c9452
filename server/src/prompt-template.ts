/**
 * Prompt Template Helper
 *
 * Reads .md prompt files that sit beside the code and injects values into
 * |* Field *| placeholders.
 *
 * Usage:
 *   const prompt = await loadPrompt("routing/router.md", {
 *     "Available Agents": JSON.stringify(agents),
 *   });
 */

import { readFile } from "fs/promises";
import { resolve, dirname } from "path";
import { fileURLToPath } from "url";
import type { ILogger } from "@switchboard/shared/logging";
import { createComponentLogger } from "./logging.js";
import { SwitchboardError } from "./errors.js";

const __filename = fileURLToPath(import.meta.url);
const __dirname = dirname(__filename);

/**
 * Replace every |* FieldName *| placeholder. Fields match case-insensitively;
 * an unknown field renders as [MISSING: FieldName].
 */
export function renderTemplate(
  template: string,
  fields: Record<string, string>,
  log?: ILogger,
): string {
  return template.replace(
    /\|\*\s*([^*]+?)\s*\*\|/g,
    (_match, fieldName: string) => {
      const key = fieldName.trim();
      const entry = Object.entries(fields).find(
        ([k]) => k.toLowerCase() === key.toLowerCase()
      );
      if (entry) {
        return entry[1];
      }
      log?.warn("Unresolved prompt placeholder", { field: key });
      return `[MISSING: ${key}]`;
    }
  );
}

/**
 * Load a prompt template from a .md file relative to src/ and inject field values.
 *
 * @param relativePath Path relative to src/ (e.g. "routing/router.md")
 */
export async function loadPrompt(
  relativePath: string,
  fields: Record<string, string>,
  log: ILogger = createComponentLogger("prompt-template"),
): Promise<string> {
  const fullPath = resolve(__dirname, relativePath);

  let template: string;
  try {
    template = await readFile(fullPath, "utf-8");
  } catch (e) {
    log.error("Failed to read prompt template", e, { path: fullPath });
    throw new SwitchboardError(`Prompt template not found: ${fullPath}`, { cause: e });
  }

  return renderTemplate(template.trim(), fields, log);
}
