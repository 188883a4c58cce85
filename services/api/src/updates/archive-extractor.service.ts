import { Injectable, Logger } from '@nestjs/common';
import AdmZip from 'adm-zip';
import { mkdir, rm } from 'fs/promises';
import { ExtractionFailedError } from '../common/errors';

@Injectable()
export class ArchiveExtractor {
  private readonly logger = new Logger(ArchiveExtractor.name);

  /**
   * Unpacks `filePath` into `destination`, overwriting existing files, then
   * deletes the archive.
   */
  async extract(filePath: string, destination: string): Promise<void> {
    try {
      await mkdir(destination, { recursive: true });
      new AdmZip(filePath).extractAllTo(destination, true);
    } catch (error) {
      throw new ExtractionFailedError(filePath, { cause: error });
    }

    await rm(filePath, { force: true });
    this.logger.log(`Extracted ${filePath} to ${destination}`);
  }
}
