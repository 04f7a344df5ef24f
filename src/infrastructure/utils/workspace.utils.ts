import { mkdir, mkdtemp } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join, resolve } from "node:path";
import {
  CLEANED_FILE_NAME,
  type RunWorkspace,
} from "../../core/domain/entities/run-workspace.entity.js";

/**
 * Creates `<parent>/taq-import-<runId>-XXXXXX`. The random suffix keeps
 * concurrent runs apart even if they share a run id.
 */
export async function createRunWorkspace(
  runId: string,
  parentDir?: string,
): Promise<RunWorkspace> {
  const parent = parentDir ? resolve(parentDir) : tmpdir();
  await mkdir(parent, { recursive: true });
  const dir = await mkdtemp(join(parent, `taq-import-${runId}-`));
  return { runId, dir, cleanedPath: join(dir, CLEANED_FILE_NAME) };
}
