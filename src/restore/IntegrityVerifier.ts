import { createReadStream, promises as fs } from 'fs';
import { basename, join } from 'path';
import { Writable } from 'stream';
import { pipeline } from 'stream/promises';
import { createGunzip } from 'zlib';
import { FileIntegrityResult, FolderIntegrityReport } from '../interfaces/IntegrityVerifier';
import { Logger } from '../interfaces/Logger';
import { isArtifactFile } from '../utils/ArtifactNaming';
import { formatError } from '../utils/errors';

export class IntegrityError extends Error {
  constructor(
    message: string,
    public readonly corrupted: string[]
  ) {
    super(message);
    this.name = 'IntegrityError';
  }
}

/**
 * Decompresses artifacts end to end without keeping the output
 */
export class IntegrityVerifier {
  private logger: Logger;

  constructor(logger: Logger) {
    this.logger = logger;
  }

  async verifyFile(filePath: string): Promise<FileIntegrityResult> {
    const fileName = basename(filePath);
    const discard = new Writable({
      write(_chunk, _encoding, callback) {
        callback();
      },
    });

    try {
      await pipeline(createReadStream(filePath), createGunzip(), discard);
      return { fileName, ok: true };
    } catch (error) {
      this.logger.warn(`Integrity check failed: ${fileName}`, { filePath, error: formatError(error) });
      return { fileName, ok: false, error: formatError(error) };
    }
  }

  /**
   * Check every compressed artifact in a folder. A folder without artifacts is not ok.
   */
  async verifyFolder(folderPath: string): Promise<FolderIntegrityReport> {
    const names = (await fs.readdir(folderPath)).filter(isArtifactFile).sort();
    const files: FileIntegrityResult[] = [];

    for (const name of names) {
      files.push(await this.verifyFile(join(folderPath, name)));
    }

    const corrupted = files.filter(file => !file.ok).map(file => file.fileName);
    const report: FolderIntegrityReport = {
      folderPath,
      files,
      corrupted,
      ok: files.length > 0 && corrupted.length === 0,
    };

    this.logger.info('Integrity check completed', {
      folderPath,
      checked: files.length,
      corrupted,
    });
    return report;
  }
}
