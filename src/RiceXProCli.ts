import type { DisplaySink, ImageSource, SessionOpener } from './types/types.js';
import z from 'zod';
import { RiceXProError } from './api/errors.js';
import { ImageFetcher } from './api/ImageFetcher.js';
import { playwrightSessionOpener, withBrowserSession } from './api/PlaywrightBrowserSession.js';
import { RiceXProSearchDriver } from './api/RiceXProSearchDriver.js';
import { getBrowserLaunchSettings, getOutputDir, getViewerApp } from './config.js';
import { ImageViewer } from './display/ImageViewer.js';
import { runExpressionLoop } from './ExpressionLoop.js';
import { GeneSchema } from './types/types.js';

export const EXIT_OK = 0;
export const EXIT_FAILURE = 1;
export const EXIT_USAGE = 2;

export const USAGE = 'Usage: rice-expression <gene>';

const ArgsSchema = z.tuple([GeneSchema]);

export interface CliDeps {
  openSession?: SessionOpener;
  images?: ImageSource;
  display?: DisplaySink;
  out?: (message: string) => void;
  err?: (message: string) => void;
}

/**
 * Runs the search-and-display loop for the gene named in `argv` and returns
 * the process exit code. The browser session spans the whole run.
 */
export async function runCli(argv: readonly string[], deps: CliDeps = {}): Promise<number> {
  const {
    openSession = playwrightSessionOpener(getBrowserLaunchSettings(false)),
    images = new ImageFetcher(),
    display = new ImageViewer({ outputDir: getOutputDir(), app: getViewerApp() }),
    out = console.log,
    err = console.error,
  } = deps;

  const parsedArgs = ArgsSchema.safeParse(argv);
  if (!parsedArgs.success) {
    err(USAGE);
    return EXIT_USAGE;
  }
  const [gene] = parsedArgs.data;

  try {
    await withBrowserSession(openSession, async (session) => {
      await runExpressionLoop(gene, {
        searcher: new RiceXProSearchDriver(session),
        images,
        display,
        notify: out,
      });
    });
    return EXIT_OK;
  }
  catch (error) {
    const message = error instanceof RiceXProError
      ? `${error.name}: ${error.message}`
      : String(error);
    err(`[RiceXPro Error] ${message}`);
    return EXIT_FAILURE;
  }
}
