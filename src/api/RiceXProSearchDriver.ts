import type { BrowserSession, ExpressionSearcher, SearchResult } from '../types/types.js';
import {
  DEV_CHART_ATTRIBUTE,
  RICEXPRO_BASE_URL,
  SEARCH_BUTTON_SELECTOR,
  SEARCH_FIELD_SELECTOR,
  SEARCH_HIT_SELECTOR,
  TISSUE_CHART_ATTRIBUTE,
} from '../constants.js';
import { GeneSchema } from '../types/types.js';
import { DriverError, ValidationError } from './errors.js';

/**
 * Runs gene searches through the RiceXPro search form. The session is
 * borrowed: the caller owns it and closes it.
 */
export class RiceXProSearchDriver implements ExpressionSearcher {
  private readonly session: BrowserSession;
  private readonly baseUrl: string;

  constructor(session: BrowserSession, baseUrl: string = RICEXPRO_BASE_URL) {
    this.session = session;
    this.baseUrl = baseUrl;
  }

  public async search(query: string): Promise<SearchResult> {
    const parsedQuery = GeneSchema.safeParse(query);
    if (!parsedQuery.success) {
      throw new ValidationError('Please provide a gene name to search for.');
    }

    await this.session.navigate(this.baseUrl);
    await this.session.typeInto(SEARCH_FIELD_SELECTOR, parsedQuery.data);
    await this.session.click(SEARCH_BUTTON_SELECTOR);

    if (!(await this.session.hasElement(SEARCH_HIT_SELECTOR))) {
      return { kind: 'not-found' };
    }

    return {
      kind: 'found',
      devImageUrl: await this.chartUrl(DEV_CHART_ATTRIBUTE),
      tissueImageUrl: await this.chartUrl(TISSUE_CHART_ATTRIBUTE),
    };
  }

  private async chartUrl(attribute: string): Promise<string> {
    const path = await this.session.readAttribute(SEARCH_HIT_SELECTOR, attribute);
    if (!path) {
      throw new DriverError(`The search hit has no ${attribute} attribute.`);
    }
    return new URL(path, this.baseUrl).toString();
  }
}
