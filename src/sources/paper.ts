export interface Figure {
  /** 0-based position in extraction order; what figure hints resolve against. */
  index: number;
  bytes: Buffer;
  name: string;
}

export interface Paper {
  id: string;
  title: string;
  abstract: string;
  /** Body text, or the abstract when the full text could not be extracted. */
  fullText: string;
  figures: Figure[];
}

export interface PaperSource {
  /** Throws FetchError when the paper cannot be found or downloaded. */
  fetch(paperId: string, workDir: string, signal?: AbortSignal): Promise<Paper>;
}
