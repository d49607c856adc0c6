import type {
  DisplaySink,
  ExpressionSearcher,
  FoundResult,
  ImageSource,
  RasterImage,
} from './types/types.js';
import { concatenateHorizontally } from './image/compositor.js';

export type LoopState = 'running' | 'stopped';

export interface ExpressionLoopDeps {
  searcher: ExpressionSearcher;
  images: ImageSource;
  display: DisplaySink;
  notify?: (message: string) => void;
  /** Stop after this many ticks even if the search keeps matching. */
  maxTicks?: number;
}

export interface LoopSummary {
  ticks: number;
  displayed: number;
  state: LoopState;
}

export function noHitsNotice(query: string): string {
  return `No hits for ${query}`;
}

/**
 * Downloads both charts of a search hit and joins them, developmental
 * stage on the left.
 */
export async function buildExpressionProfile(result: FoundResult, images: ImageSource): Promise<RasterImage> {
  const devChart = await images.fetch(result.devImageUrl);
  const tissueChart = await images.fetch(result.tissueImageUrl);
  return concatenateHorizontally(devChart, tissueChart);
}

/**
 * Searches for `query` over and over, showing the combined charts after
 * every hit, until a search comes back empty. Failures propagate.
 */
export async function runExpressionLoop(query: string, deps: ExpressionLoopDeps): Promise<LoopSummary> {
  const { searcher, images, display, notify = console.log, maxTicks } = deps;
  let state: LoopState = 'running';
  let ticks = 0;
  let displayed = 0;

  while (state === 'running') {
    if (maxTicks !== undefined && ticks >= maxTicks) {
      break;
    }
    ticks++;

    const result = await searcher.search(query);
    if (result.kind === 'not-found') {
      notify(noHitsNotice(query));
      state = 'stopped';
      break;
    }

    await display.show(await buildExpressionProfile(result, images));
    displayed++;
  }

  return { ticks, displayed, state };
}
