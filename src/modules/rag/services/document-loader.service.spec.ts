// modules/rag/services/document-loader.service.spec.ts
import { BadRequestException } from '@nestjs/common';
import { Test, TestingModule } from '@nestjs/testing';
import { createHash } from 'crypto';
import { mkdir, mkdtemp, rm, writeFile } from 'fs/promises';
import { tmpdir } from 'os';
import * as path from 'path';
import { DocumentLoaderService, LoadOptions } from './document-loader.service';

// Single-page PDF showing `text` in Helvetica, with a valid xref table
function buildPdf(text: string): Buffer {
  const stream = `BT /F1 18 Tf 20 100 Td (${text}) Tj ET`;
  const objects = [
    '<< /Type /Catalog /Pages 2 0 R >>',
    '<< /Type /Pages /Kids [3 0 R] /Count 1 >>',
    '<< /Type /Page /Parent 2 0 R /MediaBox [0 0 300 144] /Contents 4 0 R /Resources << /Font << /F1 5 0 R >> >> >>',
    `<< /Length ${stream.length} >>\nstream\n${stream}\nendstream`,
    '<< /Type /Font /Subtype /Type1 /BaseFont /Helvetica >>',
  ];

  let body = '%PDF-1.4\n';
  const offsets: number[] = [];
  objects.forEach((object, idx) => {
    offsets.push(body.length);
    body += `${idx + 1} 0 obj\n${object}\nendobj\n`;
  });

  const xrefOffset = body.length;
  body += `xref\n0 ${objects.length + 1}\n0000000000 65535 f \n`;
  body += offsets.map((offset) => `${String(offset).padStart(10, '0')} 00000 n \n`).join('');
  body += `trailer\n<< /Size ${objects.length + 1} /Root 1 0 R >>\nstartxref\n${xrefOffset}\n%%EOF\n`;
  return Buffer.from(body, 'latin1');
}

describe('DocumentLoaderService', () => {
  let service: DocumentLoaderService;
  let folder: string;

  const flat: LoadOptions = { recurse: false, supportedFileTypes: ['.txt', '.md'] };
  const recursive: LoadOptions = { recurse: true, supportedFileTypes: ['.txt', '.md'] };
  const withPdf: LoadOptions = { recurse: false, supportedFileTypes: ['.txt', '.md', '.pdf'] };

  beforeEach(async () => {
    const module: TestingModule = await Test.createTestingModule({
      providers: [DocumentLoaderService],
    }).compile();

    service = module.get<DocumentLoaderService>(DocumentLoaderService);

    folder = await mkdtemp(path.join(tmpdir(), 'corpus-'));
    await writeFile(path.join(folder, 'sky.txt'), 'The sky is blue.');
    await writeFile(path.join(folder, 'Notes.MD'), '# Notes');
    await writeFile(path.join(folder, 'image.png'), 'not text');
    await mkdir(path.join(folder, 'nested'));
    await writeFile(path.join(folder, 'nested', 'grass.txt'), 'Grass is green.');
  });

  afterEach(async () => {
    await rm(folder, { recursive: true, force: true });
  });

  describe('loadFromFolder', () => {
    it('should load supported files from the top level sorted by relative path', async () => {
      const records = await service.loadFromFolder(folder, flat);

      expect(records.map((r) => r.relativePath)).toEqual(['Notes.MD', 'sky.txt']);
    });

    it('should descend into subfolders when recursion is enabled', async () => {
      const records = await service.loadFromFolder(folder, recursive);

      expect(records.map((r) => r.relativePath)).toEqual(['Notes.MD', 'nested/grass.txt', 'sky.txt']);
    });

    it('should fill in file metadata and a content hash', async () => {
      const records = await service.loadFromFolder(folder, flat);
      const sky = records.find((r) => r.fileName === 'sky.txt');

      expect(sky).toMatchObject({
        filePath: path.join(folder, 'sky.txt'),
        fileSize: 16,
        fileExtension: '.txt',
        content: 'The sky is blue.',
        sha256: createHash('sha256').update('The sky is blue.').digest('hex'),
      });
      expect(records.find((r) => r.fileName === 'Notes.MD')?.fileExtension).toBe('.md');
    });

    it('should extract the text of PDF files', async () => {
      const pdf = buildPdf('The sky is blue.');
      await writeFile(path.join(folder, 'sky-report.pdf'), pdf);

      const records = await service.loadFromFolder(folder, withPdf);
      const report = records.find((r) => r.fileName === 'sky-report.pdf');

      expect(records.map((r) => r.relativePath)).toEqual(['Notes.MD', 'sky-report.pdf', 'sky.txt']);
      expect(report).toMatchObject({
        fileExtension: '.pdf',
        fileSize: pdf.length,
        content: 'The sky is blue.',
        sha256: createHash('sha256').update(pdf).digest('hex'),
      });
    });

    it('should keep a PDF that fails to parse with the error as content', async () => {
      await writeFile(path.join(folder, 'broken.pdf'), 'this is not a pdf');

      const records = await service.loadFromFolder(folder, withPdf);
      const broken = records.find((r) => r.fileName === 'broken.pdf');

      expect(broken?.content).toMatch(/^Error processing PDF: /);
    });

    it('should leave PDF files out unless the type is supported', async () => {
      await writeFile(path.join(folder, 'sky-report.pdf'), buildPdf('The sky is blue.'));

      const records = await service.loadFromFolder(folder, flat);

      expect(records.map((r) => r.fileName)).not.toContain('sky-report.pdf');
    });

    it('should reject a missing folder', async () => {
      await expect(
        service.loadFromFolder(path.join(folder, 'missing'), flat),
      ).rejects.toBeInstanceOf(BadRequestException);
    });

    it('should reject a path that is not a directory', async () => {
      await expect(
        service.loadFromFolder(path.join(folder, 'sky.txt'), flat),
      ).rejects.toThrow(`Path ${path.join(folder, 'sky.txt')} is not a directory`);
    });
  });

  describe('folderStats', () => {
    it('should count files per extension', async () => {
      await expect(service.folderStats(folder, recursive)).resolves.toEqual({
        folderPath: folder,
        supportedTypes: ['.txt', '.md'],
        recurseEnabled: true,
        totalFiles: 4,
        supportedFiles: 3,
        fileTypeBreakdown: { '.txt': 2, '.md': 1, '.png': 1 },
      });
    });
  });
});
