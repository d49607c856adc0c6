import { describe, expect, it } from 'vitest';
import {
  RICEXPRO_BASE_URL,
  SEARCH_BUTTON_SELECTOR,
  SEARCH_FIELD_SELECTOR,
} from '../constants.js';
import { FakeBrowserSession } from '../testing/fakes.js';
import { DriverError, ValidationError } from './errors.js';
import { RiceXProSearchDriver } from './RiceXProSearchDriver.js';

const HIT = {
  dev_barimg: 'images/dev/Os01g0100100.png',
  tissue_barimg: 'images/tissue/Os01g0100100.png',
};

describe('RiceXProSearchDriver', () => {
  it('submits the gene and resolves both chart paths against the base URL', async () => {
    const session = new FakeBrowserSession([HIT]);

    const result = await new RiceXProSearchDriver(session).search('Os01g0100100');

    expect(result).toEqual({
      kind: 'found',
      devImageUrl: 'https://ricexpro.dna.affrc.go.jp/RXP_4001/images/dev/Os01g0100100.png',
      tissueImageUrl: 'https://ricexpro.dna.affrc.go.jp/RXP_4001/images/tissue/Os01g0100100.png',
    });
    expect(session.calls).toEqual([
      `navigate ${RICEXPRO_BASE_URL}`,
      `type ${SEARCH_FIELD_SELECTOR} Os01g0100100`,
      `click ${SEARCH_BUTTON_SELECTOR}`,
    ]);
  });

  it('reports a search without a hit as not-found', async () => {
    const session = new FakeBrowserSession([null]);

    await expect(new RiceXProSearchDriver(session).search('NoSuchGene')).resolves.toEqual({ kind: 'not-found' });
  });

  it('honours a custom base URL', async () => {
    const session = new FakeBrowserSession([HIT]);

    const result = await new RiceXProSearchDriver(session, 'https://mirror.test/rxp/').search('Os01g0100100');

    expect(result).toMatchObject({ devImageUrl: 'https://mirror.test/rxp/images/dev/Os01g0100100.png' });
    expect(session.calls[0]).toBe('navigate https://mirror.test/rxp/');
  });

  it('trims the query before typing it', async () => {
    const session = new FakeBrowserSession([null]);

    await new RiceXProSearchDriver(session).search('  LOC_Os01g01010  ');

    expect(session.calls[1]).toBe(`type ${SEARCH_FIELD_SELECTOR} LOC_Os01g01010`);
  });

  it('rejects a blank query without touching the browser', async () => {
    const session = new FakeBrowserSession([HIT]);

    await expect(new RiceXProSearchDriver(session).search('   ')).rejects.toBeInstanceOf(ValidationError);
    expect(session.calls).toEqual([]);
  });

  it('fails with DriverError when the search form is missing', async () => {
    const session = new FakeBrowserSession([HIT], { hasForm: false });

    await expect(new RiceXProSearchDriver(session).search('Os01g0100100')).rejects.toBeInstanceOf(DriverError);
  });

  it('fails with DriverError when the hit lacks a chart attribute', async () => {
    const session = new FakeBrowserSession([{ dev_barimg: 'images/dev/x.png' }]);

    await expect(new RiceXProSearchDriver(session).search('Os01g0100100')).rejects.toThrow(
      'The search hit has no tissue_barimg attribute.',
    );
  });
});
