import nodeFs from 'node:fs/promises';
import { atomicWrite, CommitError, CommitPolicy, errorMessage, Fs } from '@constify/shared';

export const DRY_RUN_SUFFIX = '.new';
export const BACKUP_SUFFIX = '.bak';

export interface CommitReceipt {
  policy: CommitPolicy;
  /** Where the rewritten text now lives */
  outputPath: string;
  /** Copy of the original, for `overwrite-with-backup` */
  backupPath?: string;
}

/**
 * Persists rewritten source under a commit policy.
 *
 * Every policy goes through a temp-file-and-rename, so after any single
 * failing step the target holds either its previous content or the new
 * content in full. `overwrite-with-backup` copies the original aside first
 * and never touches it when that copy fails.
 */
export class CommitWriter {
  constructor(private readonly fs: Fs = nodeFs) {}

  async commit(path: string, text: string, policy: CommitPolicy): Promise<CommitReceipt> {
    switch (policy) {
      case 'dry-run': {
        const outputPath = path + DRY_RUN_SUFFIX;
        await this.write(path, outputPath, text);
        return { policy, outputPath };
      }
      case 'overwrite':
        await this.write(path, path, text);
        return { policy, outputPath: path };
      case 'overwrite-with-backup': {
        const backupPath = path + BACKUP_SUFFIX;
        try {
          await this.fs.copyFile(path, backupPath);
        } catch (error) {
          throw new CommitError(path, `Backup to ${backupPath} failed: ${errorMessage(error)}`, {
            cause: error,
          });
        }
        await this.write(path, path, text);
        return { policy, outputPath: path, backupPath };
      }
      default: {
        const unknownPolicy: never = policy;
        throw new CommitError(path, `Unknown commit policy: ${String(unknownPolicy)}`);
      }
    }
  }

  private async write(path: string, target: string, text: string): Promise<void> {
    try {
      await atomicWrite(target, text, this.fs);
    } catch (error) {
      throw new CommitError(path, `Writing ${target} failed: ${errorMessage(error)}`, {
        cause: error,
      });
    }
  }
}
