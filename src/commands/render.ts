import { formatOutput, parseOutputFormat } from '../output-formatter.js';
import type { RenderCommandOptions, RenderRequest, RenderResult } from '../types.js';
import type { ContentEngine } from '../engine.js';
import { openContent, parseVariablePairs, reportFailure } from './shared.js';

/**
 * Build a render request from command options
 */
export function buildRenderRequest(options: RenderCommandOptions): RenderRequest {
  if (options.article === undefined && options.collection === undefined) {
    throw new Error('Pass --article <id>, --collection <id>, or both');
  }
  if (options.url !== undefined && options.collection === undefined) {
    throw new Error('--url needs --collection');
  }

  return {
    clientId: options.client,
    articleId: options.article,
    collectionId: options.collection,
    url: options.url,
    cacheable: parseVariablePairs(options.var),
    uncacheable: parseVariablePairs(options.requestVar),
    raw: options.raw ?? false,
  };
}

/**
 * Render the request `repeat` times, one after another.
 * Later passes are normally served from the render cache.
 */
export async function renderRepeated(
  engine: ContentEngine,
  request: RenderRequest,
  repeat = 1
): Promise<RenderResult[]> {
  const results: RenderResult[] = [];
  for (let pass = 0; pass < Math.max(1, repeat); pass++) {
    results.push(await engine.render(request));
  }
  return results;
}

/**
 * Handle the render command
 */
export async function handleRenderCommand(options: RenderCommandOptions): Promise<void> {
  try {
    const format = parseOutputFormat(options.format);
    const request = buildRenderRequest(options);
    const { engine, logger } = await openContent(options.content, { verbose: options.verbose });

    const results = await renderRepeated(engine, request, options.repeat);
    const stats = engine.cacheStats();
    logger.debug(`Render cache: ${stats.hits} hit(s), ${stats.misses} miss(es), ${stats.entries} entr(ies)`);
    engine.dispose();

    console.log(formatOutput({ kind: 'render', results }, format));
  } catch (error) {
    reportFailure('Failed to render', error, options.verbose);
    process.exit(1);
  }
}
