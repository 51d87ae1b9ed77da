import { mkdir, writeFile } from "node:fs/promises";
import { join } from "node:path";

import type { ProofDocument } from "./protocol.js";

/**
 * Persist a generated proof document for later verification.
 *
 * @returns The file name written inside `outputDir`
 */
export async function saveProofDocument(
  outputDir: string,
  sessionId: string,
  document: ProofDocument
): Promise<string> {
  const fileName = `proof_${sessionId}.json`;
  await mkdir(outputDir, { recursive: true });
  await writeFile(
    join(outputDir, fileName),
    `${JSON.stringify(document, null, 2)}\n`
  );
  return fileName;
}
