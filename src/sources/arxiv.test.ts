import * as fs from 'fs/promises';
import * as path from 'path';
import { extractImages, extractText } from '../media/pdf.js';
import { FetchError } from '../utils/errors.js';
import { makeTempDir, removeDir } from '../testing/tmp.js';
import { createArxivSource, normalizeArxivId, parseArxivFeed } from './arxiv.js';

vi.mock('../media/pdf.js', () => ({
  extractText: vi.fn(),
  extractImages: vi.fn(),
}));

const FEED = `<?xml version="1.0" encoding="UTF-8"?>
<feed xmlns="http://www.w3.org/2005/Atom">
  <title type="html">ArXiv Query: id_list=2401.00001</title>
  <entry>
    <id>http://arxiv.org/abs/2401.00001v1</id>
    <title>Sparse Widgets &amp;
      Dense Gadgets</title>
    <summary>  We study widgets &lt;and&gt; gadgets.
    </summary>
    <link href="http://arxiv.org/abs/2401.00001v1" rel="alternate" type="text/html"/>
    <link title="pdf" href="http://arxiv.org/pdf/2401.00001v1" rel="related" type="application/pdf"/>
  </entry>
</feed>`;

const ERROR_FEED = `<feed xmlns="http://www.w3.org/2005/Atom">
  <entry>
    <id>http://arxiv.org/api/errors#incorrect_id_format_for_9999.99999</id>
    <title>Error</title>
    <summary>incorrect id format for 9999.99999</summary>
  </entry>
</feed>`;

const EMPTY_FEED = '<feed xmlns="http://www.w3.org/2005/Atom"><title>ArXiv Query</title></feed>';

describe('normalizeArxivId', () => {
  it('accepts bare new- and old-style ids', () => {
    expect(normalizeArxivId('2401.06015')).toBe('2401.06015');
    expect(normalizeArxivId('hep-th/9901001v2')).toBe('hep-th/9901001v2');
    expect(normalizeArxivId('math.GT/0309136')).toBe('math.GT/0309136');
  });

  it('extracts the id from abs and pdf URLs', () => {
    expect(normalizeArxivId(' https://arxiv.org/abs/2401.06015v2 ')).toBe('2401.06015v2');
    expect(normalizeArxivId('https://arxiv.org/pdf/2401.06015.pdf')).toBe('2401.06015');
  });

  it('rejects anything else', () => {
    expect(() => normalizeArxivId('not-a-paper')).toThrow(new FetchError('Not an arXiv identifier: "not-a-paper"'));
  });
});

describe('parseArxivFeed', () => {
  it('reads the first entry with entities decoded and whitespace collapsed', () => {
    expect(parseArxivFeed(FEED)).toEqual({
      id: 'http://arxiv.org/abs/2401.00001v1',
      title: 'Sparse Widgets & Dense Gadgets',
      summary: 'We study widgets <and> gadgets.',
      pdfUrl: 'http://arxiv.org/pdf/2401.00001v1',
    });
  });

  it('treats the API error record and an empty feed as no paper', () => {
    expect(parseArxivFeed(ERROR_FEED)).toBeUndefined();
    expect(parseArxivFeed(EMPTY_FEED)).toBeUndefined();
  });
});

describe('createArxivSource', () => {
  const fetchMock = vi.fn<typeof fetch>();
  const source = createArxivSource({ apiUrl: 'https://api.test/query' });
  let dir: string;

  beforeEach(async () => {
    vi.clearAllMocks();
    fetchMock.mockReset();
    vi.stubGlobal('fetch', fetchMock);
    dir = await makeTempDir();
    vi.mocked(extractText).mockResolvedValue('Full body text.');
    vi.mocked(extractImages).mockResolvedValue([{ name: 'img-000.png', bytes: Buffer.from('figure') }]);
  });

  afterEach(async () => {
    vi.unstubAllGlobals();
    await removeDir(dir);
  });

  it('combines feed metadata with the PDF text and figures', async () => {
    fetchMock
      .mockResolvedValueOnce(new Response(FEED))
      .mockResolvedValueOnce(new Response('%PDF-1.4 test'));

    const paper = await source.fetch('2401.00001', dir);

    expect(paper).toEqual({
      id: '2401.00001',
      title: 'Sparse Widgets & Dense Gadgets',
      abstract: 'We study widgets <and> gadgets.',
      fullText: 'Full body text.',
      figures: [{ index: 0, bytes: Buffer.from('figure'), name: 'img-000.png' }],
    });
    expect(fetchMock.mock.calls.map(([url]) => url)).toEqual([
      'https://api.test/query?id_list=2401.00001',
      'http://arxiv.org/pdf/2401.00001v1',
    ]);
    expect(await fs.readFile(path.join(dir, 'paper.pdf'), 'utf-8')).toBe('%PDF-1.4 test');
    expect(vi.mocked(extractImages)).toHaveBeenCalledWith(path.join(dir, 'paper.pdf'), path.join(dir, 'figures'), undefined);
  });

  it('falls back to the abstract when the PDF is unavailable', async () => {
    fetchMock
      .mockResolvedValueOnce(new Response(FEED))
      .mockResolvedValueOnce(new Response('gone', { status: 404 }));

    const paper = await source.fetch('2401.00001', dir);

    expect(paper.fullText).toBe('We study widgets <and> gadgets.');
    expect(paper.figures).toEqual([]);
    expect(vi.mocked(extractText)).not.toHaveBeenCalled();
  });

  it('falls back to the abstract when extraction fails', async () => {
    fetchMock
      .mockResolvedValueOnce(new Response(FEED))
      .mockResolvedValueOnce(new Response('%PDF-1.4 test'));
    vi.mocked(extractImages).mockRejectedValueOnce(new Error('pdfimages failed: Syntax Error'));

    const paper = await source.fetch('2401.00001', dir);

    expect([paper.fullText, paper.figures]).toEqual(['We study widgets <and> gadgets.', []]);
  });

  it('fails on API errors', async () => {
    fetchMock.mockResolvedValueOnce(new Response('busy', { status: 503 }));

    await expect(source.fetch('2401.00001', dir)).rejects.toThrow(new FetchError('arXiv API returned HTTP 503'));
  });

  it('fails when the request itself fails', async () => {
    fetchMock.mockRejectedValueOnce(new TypeError('fetch failed'));

    await expect(source.fetch('2401.00001', dir)).rejects.toThrow('arXiv API request failed: fetch failed');
  });

  it('fails when arXiv has no such paper', async () => {
    fetchMock.mockResolvedValueOnce(new Response(ERROR_FEED));

    await expect(source.fetch('2401.00001', dir)).rejects.toThrow('arXiv has no paper with id 2401.00001');
  });

  it('rejects malformed ids before any request', async () => {
    await expect(source.fetch('hello world', dir)).rejects.toBeInstanceOf(FetchError);
    expect(fetchMock).not.toHaveBeenCalled();
  });
});
