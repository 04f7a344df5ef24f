import { join } from "node:path";

export const CLEANED_FILE_NAME = "taq_clean";

export interface RunWorkspace {
  runId: string;
  dir: string;
  cleanedPath: string;
}

export function chunkFileName(index: number): string {
  return `taq_chunk_${index}.csv`;
}

export function chunkFilePath(workspace: RunWorkspace, index: number): string {
  return join(workspace.dir, chunkFileName(index));
}
