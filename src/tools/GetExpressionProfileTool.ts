import type { CallToolResult } from '@modelcontextprotocol/sdk/types.js';
import type { ImageSource, SessionOpener } from '../types/types.js';
import z from 'zod';
import { RiceXProError } from '../api/errors.js';
import { withBrowserSession } from '../api/PlaywrightBrowserSession.js';
import { RiceXProSearchDriver } from '../api/RiceXProSearchDriver.js';
import { buildExpressionProfile, noHitsNotice } from '../ExpressionLoop.js';
import { encodePng } from '../image/codec.js';
import { GeneSchema } from '../types/types.js';

export class GetExpressionProfileTool {
  public readonly name: string = 'get-expression-profile';
  public readonly description: string = 'Look up a rice gene on RiceXPro and return its expression bar charts, '
    + 'developmental stage on the left and tissue on the right, as a single PNG image. '
    + 'Use this when the user asks where or when a rice gene is expressed.';

  public readonly inputSchema = z.object({
    gene: GeneSchema,
  }).describe('Look up the expression profile of a rice gene');

  private readonly openSession: SessionOpener;
  private readonly images: ImageSource;

  constructor(openSession: SessionOpener, images: ImageSource) {
    this.openSession = openSession;
    this.images = images;
  }

  public async execute({ gene }: z.infer<typeof this.inputSchema>): Promise<CallToolResult> {
    try {
      return await withBrowserSession(this.openSession, async (session): Promise<CallToolResult> => {
        const result = await new RiceXProSearchDriver(session).search(gene);
        if (result.kind === 'not-found') {
          return {
            content: [{ type: 'text', text: noHitsNotice(gene) }],
            isError: false,
          };
        }

        const profile = await buildExpressionProfile(result, this.images);
        const png = await encodePng(profile);
        const text = `Gene: ${gene}\n`
          + `Developmental stage chart: ${result.devImageUrl}\n`
          + `Tissue chart: ${result.tissueImageUrl}\n`
          + `Combined size: ${profile.width}x${profile.height}`;

        return {
          content: [
            { type: 'text', text },
            { type: 'image', data: png.toString('base64'), mimeType: 'image/png' },
          ],
          structuredContent: {
            gene,
            devImageUrl: result.devImageUrl,
            tissueImageUrl: result.tissueImageUrl,
            width: profile.width,
            height: profile.height,
          },
          isError: false,
        };
      });
    }
    catch (error) {
      // Note: Error is returned to user in the tool response below.
      // No need to log to stderr as it would leak implementation details in stdio mode.
      const message = error instanceof RiceXProError && error.isUserFriendly
        ? error.message
        : `Error looking up gene ${gene}: ${error}`;
      return {
        content: [{ type: 'text', text: message }],
        isError: true,
      };
    }
  }
}
