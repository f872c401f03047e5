import { spawnAsync } from '@pagescribe/shared';
import { existsSync, mkdirSync, readdirSync } from 'node:fs';
import { type Mock, beforeEach, describe, expect, test, vi } from 'vitest';

import {
  InvalidDocumentError,
  PageRangeError,
  RenderError,
} from '../errors/conversion-error';
import {
  ImageRenderWorker,
  PdfRenderWorker,
  clampPageRange,
  createRenderWorker,
} from './render-worker';

vi.mock('@pagescribe/shared', () => ({
  spawnAsync: vi.fn(),
}));

vi.mock('node:fs', () => ({
  existsSync: vi.fn(),
  mkdirSync: vi.fn(),
  readdirSync: vi.fn(),
}));

const mockLogger = {
  info: vi.fn(),
  warn: vi.fn(),
  error: vi.fn(),
  debug: vi.fn(),
};

const mockSpawnAsync = spawnAsync as Mock;
const mockExistsSync = existsSync as Mock;
const mockReaddirSync = readdirSync as Mock;

const options = { logger: mockLogger, outputDir: '/work/run' };

function pdfinfoResult(pages: number) {
  return {
    code: 0,
    stdout: `Title:          Sample\nPages:          ${pages}\nEncrypted:      no\n`,
    stderr: '',
  };
}

describe('clampPageRange', () => {
  test('resolves an open end to the last page', () => {
    expect(clampPageRange({ start: 2, end: 0 }, 5)).toEqual({
      start: 2,
      end: 5,
    });
  });

  test('keeps a range inside the document', () => {
    expect(clampPageRange({ start: 1, end: 3 }, 3)).toEqual({
      start: 1,
      end: 3,
    });
  });

  test('rejects a start page past the end', () => {
    expect(() => clampPageRange({ start: 4, end: 0 }, 3)).toThrow(
      new PageRangeError('Start page 4 is out of range (document has 3 pages)'),
    );
  });

  test('rejects an end page past the end', () => {
    expect(() => clampPageRange({ start: 1, end: 2 }, 1)).toThrow(
      'End page 2 is out of range (document has 1 page)',
    );
  });
});

describe('createRenderWorker', () => {
  test('creates a PDF worker for .pdf files', () => {
    expect(
      createRenderWorker('/work/run/input.pdf', { start: 1, end: 0 }, options),
    ).toBeInstanceOf(PdfRenderWorker);
  });

  test.each(['input.jpg', 'input.jpeg', 'input.png', 'input.BMP'])(
    'creates an image worker for %s',
    (name) => {
      expect(
        createRenderWorker(`/work/run/${name}`, { start: 1, end: 0 }, options),
      ).toBeInstanceOf(ImageRenderWorker);
    },
  );

  test('rejects unsupported document types', () => {
    expect(() =>
      createRenderWorker('/work/run/input.docx', { start: 1, end: 0 }, options),
    ).toThrow(new InvalidDocumentError('Unsupported document type: .docx'));
    expect(() =>
      createRenderWorker('/work/run/input', { start: 1, end: 0 }, options),
    ).toThrow('Unsupported document type: /work/run/input');
  });
});

describe('PdfRenderWorker', () => {
  beforeEach(() => {
    vi.clearAllMocks();
    mockExistsSync.mockReturnValue(false);
    mockReaddirSync.mockReturnValue([]);
  });

  test('renders the whole document with magick', async () => {
    mockSpawnAsync
      .mockResolvedValueOnce(pdfinfoResult(3))
      .mockResolvedValueOnce({ code: 0, stdout: '', stderr: '' });
    mockReaddirSync.mockReturnValue([
      'page_0002.png',
      'page_0001.png',
      'page_0003.png',
    ]);

    const worker = new PdfRenderWorker(
      '/work/run/input.pdf',
      { start: 1, end: 0 },
      options,
    );
    const pages = await worker.render();

    expect(mockSpawnAsync).toHaveBeenNthCalledWith(1, 'pdfinfo', [
      '/work/run/input.pdf',
    ]);
    expect(mockSpawnAsync).toHaveBeenNthCalledWith(2, 'magick', [
      '-density',
      '300',
      '/work/run/input.pdf[0-2]',
      '-scene',
      '1',
      '-background',
      'white',
      '-alpha',
      'remove',
      '-alpha',
      'off',
      '/work/run/pages/page_%04d.png',
    ]);
    expect(mkdirSync).toHaveBeenCalledWith('/work/run/pages', {
      recursive: true,
    });
    expect(pages).toEqual([
      '/work/run/pages/page_0002.png',
      '/work/run/pages/page_0001.png',
      '/work/run/pages/page_0003.png',
    ]);
    expect(mockLogger.info).toHaveBeenCalledWith(
      '[PdfRenderWorker] Rendering pages 1-3 of 3 at 300 DPI...',
    );
    expect(mockLogger.info).toHaveBeenCalledWith(
      '[PdfRenderWorker] Rendered 3 pages to /work/run/pages',
    );
  });

  test('selects the requested pages and numbers files from the start page', async () => {
    mockSpawnAsync
      .mockResolvedValueOnce(pdfinfoResult(10))
      .mockResolvedValueOnce({ code: 0, stdout: '', stderr: '' });

    const worker = new PdfRenderWorker(
      '/work/run/input.pdf',
      { start: 3, end: 5 },
      { ...options, dpi: 144 },
    );
    await worker.render();

    expect(mockSpawnAsync).toHaveBeenLastCalledWith('magick', [
      '-density',
      '144',
      '/work/run/input.pdf[2-4]',
      '-scene',
      '3',
      '-background',
      'white',
      '-alpha',
      'remove',
      '-alpha',
      'off',
      '/work/run/pages/page_%04d.png',
    ]);
  });

  test('skips creating the pages directory when it exists', async () => {
    mockExistsSync.mockReturnValue(true);
    mockSpawnAsync
      .mockResolvedValueOnce(pdfinfoResult(1))
      .mockResolvedValueOnce({ code: 0, stdout: '', stderr: '' });

    await new PdfRenderWorker(
      '/work/run/input.pdf',
      { start: 1, end: 0 },
      options,
    ).render();

    expect(mkdirSync).not.toHaveBeenCalled();
  });

  test('ignores non-page files in the pages directory', async () => {
    mockSpawnAsync
      .mockResolvedValueOnce(pdfinfoResult(1))
      .mockResolvedValueOnce({ code: 0, stdout: '', stderr: '' });
    mockReaddirSync.mockReturnValue(['page_0001.png', '.DS_Store', 'thumb.png']);

    const pages = await new PdfRenderWorker(
      '/work/run/input.pdf',
      { start: 1, end: 0 },
      options,
    ).render();

    expect(pages).toEqual(['/work/run/pages/page_0001.png']);
  });

  test('rejects a range past the last page before rendering', async () => {
    mockSpawnAsync.mockResolvedValueOnce(pdfinfoResult(2));

    await expect(
      new PdfRenderWorker(
        '/work/run/input.pdf',
        { start: 3, end: 0 },
        options,
      ).render(),
    ).rejects.toThrow('Start page 3 is out of range (document has 2 pages)');
    expect(mockSpawnAsync).toHaveBeenCalledTimes(1);
  });

  test('reports an unreadable PDF as an invalid document', async () => {
    mockSpawnAsync.mockResolvedValueOnce({
      code: 1,
      stdout: '',
      stderr: "Syntax Error: Couldn't find trailer dictionary",
    });

    await expect(
      new PdfRenderWorker(
        '/work/run/input.pdf',
        { start: 1, end: 0 },
        options,
      ).render(),
    ).rejects.toThrow(
      new InvalidDocumentError(
        "Unable to read PDF: Syntax Error: Couldn't find trailer dictionary",
      ),
    );
  });

  test('reports a PDF without pages as an invalid document', async () => {
    mockSpawnAsync.mockResolvedValueOnce({
      code: 0,
      stdout: 'Title: empty\n',
      stderr: '',
    });

    await expect(
      new PdfRenderWorker(
        '/work/run/input.pdf',
        { start: 1, end: 0 },
        options,
      ).render(),
    ).rejects.toThrow('Unable to read PDF: no pages found');
  });

  test('throws RenderError when magick fails', async () => {
    mockSpawnAsync
      .mockResolvedValueOnce(pdfinfoResult(1))
      .mockResolvedValueOnce({ code: 1, stdout: '', stderr: '' });

    await expect(
      new PdfRenderWorker(
        '/work/run/input.pdf',
        { start: 1, end: 0 },
        options,
      ).render(),
    ).rejects.toThrow(
      new RenderError('Failed to render PDF pages: Unknown error'),
    );
  });

  test('throws RenderError when a binary is missing', async () => {
    mockSpawnAsync.mockRejectedValueOnce(new Error('spawn pdfinfo ENOENT'));

    const promise = new PdfRenderWorker(
      '/work/run/input.pdf',
      { start: 1, end: 0 },
      options,
    ).render();

    await expect(promise).rejects.toBeInstanceOf(RenderError);
    await expect(promise).rejects.toThrow(
      'Failed to run pdfinfo: spawn pdfinfo ENOENT',
    );
  });
});

describe('ImageRenderWorker', () => {
  beforeEach(() => {
    vi.clearAllMocks();
  });

  test('returns the image itself as the only page', async () => {
    const worker = new ImageRenderWorker(
      '/work/run/input.png',
      { start: 1, end: 0 },
      options,
    );

    await expect(worker.render()).resolves.toEqual(['/work/run/input.png']);
    expect(mockSpawnAsync).not.toHaveBeenCalled();
    expect(mockLogger.info).toHaveBeenCalledWith(
      '[ImageRenderWorker] Using image /work/run/input.png as a single page',
    );
  });

  test('accepts an explicit single-page range', async () => {
    const worker = new ImageRenderWorker(
      '/work/run/input.jpg',
      { start: 1, end: 1 },
      options,
    );

    await expect(worker.render()).resolves.toEqual(['/work/run/input.jpg']);
  });

  test('rejects pages beyond the first', async () => {
    const worker = new ImageRenderWorker(
      '/work/run/input.jpg',
      { start: 2, end: 0 },
      options,
    );

    await expect(worker.render()).rejects.toThrow(
      'Start page 2 is out of range (document has 1 page)',
    );
  });
});
