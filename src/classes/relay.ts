import fs from 'fs';
import os from 'os';
import path from 'path';
import type { RemoteSession } from '../interfaces';
import { errorMessage, fail, okWith, type StepResult } from '../lib/result';

export const DEFAULT_RELAY_PATH = path.join(os.tmpdir(), 'wpmig-relay.tmp');

export interface RelayTimings {
  downloadMs: number;
  uploadMs: number;
}

/**
 * Move a file between two servers that cannot reach each other by
 * downloading it to a local relay file and uploading it again. The relay
 * file is removed afterwards whatever happened. Errors come back as a
 * failed result, never as an exception.
 */
export async function relayFile(
  source: RemoteSession,
  sourcePath: string,
  destination: RemoteSession,
  destinationPath: string,
  relayPath: string = DEFAULT_RELAY_PATH
): Promise<StepResult<RelayTimings>> {
  try {
    const downloadStart = Date.now();
    await source.downloadFile(sourcePath, relayPath);
    const downloadMs = Date.now() - downloadStart;

    const uploadStart = Date.now();
    await destination.uploadFile(relayPath, destinationPath);
    const uploadMs = Date.now() - uploadStart;

    return okWith(
      `Transferred ${source.label}:${sourcePath} to ${destination.label}:${destinationPath}`,
      { downloadMs, uploadMs }
    );
  } catch (error) {
    return fail(`Transfer failed: ${errorMessage(error)}`);
  } finally {
    await fs.promises.rm(relayPath, { force: true });
  }
}
