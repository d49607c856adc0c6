import { describe, expect, it, vi } from 'vitest';
import { FetchError } from './api/errors.js';
import { EXIT_FAILURE, EXIT_OK, EXIT_USAGE, runCli, USAGE } from './RiceXProCli.js';
import { FakeBrowserSession, FakeImageSource, RecordingDisplay, solidRaster } from './testing/fakes.js';

const HIT = { dev_barimg: 'dev/a.png', tissue_barimg: 'tissue/a.png' };
const DEV_URL = 'https://ricexpro.dna.affrc.go.jp/RXP_4001/dev/a.png';
const TISSUE_URL = 'https://ricexpro.dna.affrc.go.jp/RXP_4001/tissue/a.png';

function charts(): FakeImageSource {
  return new FakeImageSource({
    [DEV_URL]: solidRaster(2, 2, [1, 1, 1]),
    [TISSUE_URL]: solidRaster(2, 2, [2, 2, 2]),
  });
}

describe('runCli', () => {
  it('prints usage and opens no browser without a gene', async () => {
    const openSession = vi.fn(async () => new FakeBrowserSession());
    const err = vi.fn();

    const code = await runCli([], { openSession, err, out: vi.fn() });

    expect(code).toBe(EXIT_USAGE);
    expect(err).toHaveBeenCalledWith(USAGE);
    expect(openSession).not.toHaveBeenCalled();
  });

  it('rejects extra arguments', async () => {
    const err = vi.fn();

    const code = await runCli(['Os01g0100100', 'extra'], { openSession: async () => new FakeBrowserSession(), err });

    expect(code).toBe(EXIT_USAGE);
  });

  it('shows every hit and exits cleanly once the search stops matching', async () => {
    const session = new FakeBrowserSession([HIT, HIT, null]);
    const display = new RecordingDisplay();
    const out = vi.fn();

    const code = await runCli(['Os01g0100100'], {
      openSession: async () => session,
      images: charts(),
      display,
      out,
      err: vi.fn(),
    });

    expect(code).toBe(EXIT_OK);
    expect(display.shown).toHaveLength(2);
    expect(out).toHaveBeenCalledWith('No hits for Os01g0100100');
    expect(session.closeCount).toBe(1);
  });

  it('exits with a failure and still closes the browser when a chart download fails', async () => {
    const session = new FakeBrowserSession([HIT]);
    const err = vi.fn();
    const images = {
      fetch: async (url: string) => {
        throw new FetchError('RiceXPro is experiencing issues. Please try again later.', url, 502);
      },
    };

    const code = await runCli(['Os01g0100100'], {
      openSession: async () => session,
      images,
      display: new RecordingDisplay(),
      out: vi.fn(),
      err,
    });

    expect(code).toBe(EXIT_FAILURE);
    expect(err).toHaveBeenCalledWith('[RiceXPro Error] FetchError: RiceXPro is experiencing issues. Please try again later.');
    expect(session.closeCount).toBe(1);
  });

  it('reports unexpected errors as they are', async () => {
    const err = vi.fn();
    const display = {
      show: async () => {
        throw new Error('no display available');
      },
    };

    const code = await runCli(['Os01g0100100'], {
      openSession: async () => new FakeBrowserSession([HIT]),
      images: charts(),
      display,
      out: vi.fn(),
      err,
    });

    expect(code).toBe(EXIT_FAILURE);
    expect(err).toHaveBeenCalledWith('[RiceXPro Error] Error: no display available');
  });
});
