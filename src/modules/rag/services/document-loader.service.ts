// modules/rag/services/document-loader.service.ts
import { BadRequestException, Injectable, Logger } from '@nestjs/common';
import { createHash } from 'crypto';
import { readdir, readFile, stat } from 'fs/promises';
import * as path from 'path';
import pdfParse from 'pdf-parse';
import { DocumentRecord } from '../../vectordb/interfaces/vector/vector.interface';
import { FolderStats } from '../interfaces/chat.interface';
import { describeError } from '../../../common/utils/error.util';

export interface LoadOptions {
  recurse: boolean;
  supportedFileTypes: string[];
}

@Injectable()
export class DocumentLoaderService {
  private readonly logger = new Logger(DocumentLoaderService.name);

  /**
   * Read every supported file under `folder` into a DocumentRecord.
   * Records come back sorted by relative path; unreadable files are skipped.
   */
  async loadFromFolder(folder: string, options: LoadOptions): Promise<DocumentRecord[]> {
    await this.assertFolder(folder);

    const files = await this.listFiles(folder, options.recurse);
    const supported = files.filter((file) => this.isSupported(file, options.supportedFileTypes));

    const records: DocumentRecord[] = [];
    for (const file of supported) {
      try {
        records.push(await this.readRecord(folder, file));
      } catch (error) {
        this.logger.error(`Failed to read ${file}: ${describeError(error)}`);
      }
    }

    records.sort((a, b) => (a.relativePath < b.relativePath ? -1 : a.relativePath > b.relativePath ? 1 : 0));
    this.logger.log(`📂 Loaded ${records.length} documents from ${folder}`);
    return records;
  }

  async folderStats(folder: string, options: LoadOptions): Promise<FolderStats> {
    await this.assertFolder(folder);

    const files = await this.listFiles(folder, options.recurse);
    const fileTypeBreakdown: Record<string, number> = {};
    let supportedFiles = 0;

    for (const file of files) {
      const extension = path.extname(file).toLowerCase() || '(none)';
      fileTypeBreakdown[extension] = (fileTypeBreakdown[extension] || 0) + 1;
      if (this.isSupported(file, options.supportedFileTypes)) supportedFiles++;
    }

    return {
      folderPath: folder,
      supportedTypes: options.supportedFileTypes,
      recurseEnabled: options.recurse,
      totalFiles: files.length,
      supportedFiles,
      fileTypeBreakdown,
    };
  }

  private async assertFolder(folder: string): Promise<void> {
    let isDirectory: boolean;
    try {
      isDirectory = (await stat(folder)).isDirectory();
    } catch {
      throw new BadRequestException(`Folder path ${folder} does not exist`);
    }
    if (!isDirectory) {
      throw new BadRequestException(`Path ${folder} is not a directory`);
    }
  }

  private async listFiles(folder: string, recurse: boolean): Promise<string[]> {
    const entries = await readdir(folder, { withFileTypes: true });
    const files: string[] = [];

    for (const entry of entries) {
      const fullPath = path.join(folder, entry.name);
      if (entry.isDirectory()) {
        if (recurse) files.push(...(await this.listFiles(fullPath, true)));
      } else if (entry.isFile()) {
        files.push(fullPath);
      }
    }
    return files;
  }

  private isSupported(file: string, supportedFileTypes: string[]): boolean {
    return supportedFileTypes.includes(path.extname(file).toLowerCase());
  }

  private async readRecord(folder: string, filePath: string): Promise<DocumentRecord> {
    const buffer = await readFile(filePath);
    const info = await stat(filePath);
    const fileExtension = path.extname(filePath).toLowerCase();

    return {
      filePath,
      fileName: path.basename(filePath),
      fileSize: info.size,
      fileExtension,
      lastModified: info.mtime.toISOString(),
      relativePath: path.relative(folder, filePath).split(path.sep).join('/'),
      sha256: createHash('sha256').update(buffer).digest('hex'),
      content: fileExtension === '.pdf' ? await this.extractPdfText(filePath, buffer) : buffer.toString('utf-8'),
    };
  }

  /**
   * A PDF that cannot be parsed is still loaded, with the parse error as its content.
   */
  private async extractPdfText(filePath: string, buffer: Buffer): Promise<string> {
    try {
      const data = await pdfParse(buffer);
      return data.text.trim();
    } catch (error) {
      this.logger.error(`Error processing PDF ${filePath}: ${describeError(error)}`);
      return `Error processing PDF: ${describeError(error)}`;
    }
  }
}
