import { formatOutput, parseOutputFormat } from '../output-formatter.js';
import type { CollectionCommandOptions, MenuCommandOptions } from '../types.js';
import { openContent, reportFailure } from './shared.js';

/**
 * Handle the menu command: list a menu's navigation entries
 */
export async function handleMenuCommand(options: MenuCommandOptions): Promise<void> {
  try {
    const format = parseOutputFormat(options.format);
    const { engine } = await openContent(options.content);
    const entries = await engine.listMenu(options.client, options.menu);
    console.log(formatOutput({ kind: 'menu', menuId: options.menu, entries }, format));
  } catch (error) {
    reportFailure('Failed to list menu', error);
    process.exit(1);
  }
}

/**
 * Handle the collection command: a collection's articles and menus
 */
export async function handleCollectionCommand(options: CollectionCommandOptions): Promise<void> {
  try {
    const format = parseOutputFormat(options.format);
    const { engine } = await openContent(options.content);
    const description = await engine.describeCollection(options.client, options.collection);
    console.log(formatOutput({ kind: 'collection', description }, format));
  } catch (error) {
    reportFailure('Failed to describe collection', error);
    process.exit(1);
  }
}
