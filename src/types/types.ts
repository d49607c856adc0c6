import z from 'zod';

export const GeneSchema = z.string()
  .trim()
  .min(1, 'A gene name is required')
  .describe('Gene name or locus ID to search on RiceXPro, e.g. Os01g0100100');

/**
 * Decoded bitmap, RGB, row-major, 3 bytes per pixel.
 */
export interface RasterImage {
  readonly width: number;
  readonly height: number;
  readonly data: Uint8Array;
}

export type Rgb = readonly [number, number, number];

export type SearchResult =
  | { kind: 'found'; devImageUrl: string; tissueImageUrl: string }
  | { kind: 'not-found' };

export type FoundResult = Extract<SearchResult, { kind: 'found' }>;

/**
 * Browser capabilities the search flow relies on. Selectors are CSS.
 */
export interface BrowserSession {
  navigate(url: string): Promise<void>;
  hasElement(selector: string): Promise<boolean>;
  typeInto(selector: string, text: string): Promise<void>;
  click(selector: string): Promise<void>;
  readAttribute(selector: string, name: string): Promise<string | null>;
  close(): Promise<void>;
}

export type SessionOpener = () => Promise<BrowserSession>;

export interface ExpressionSearcher {
  search(query: string): Promise<SearchResult>;
}

export interface ImageSource {
  fetch(url: string): Promise<RasterImage>;
}

export interface DisplaySink {
  show(image: RasterImage): Promise<void>;
}
