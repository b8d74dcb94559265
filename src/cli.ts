import { Command, InvalidArgumentError } from 'commander';
import { readFileSync } from 'node:fs';
import path from 'node:path';
import { handleCollectionCommand, handleMenuCommand } from './commands/menu.js';
import { handleRenderCommand } from './commands/render.js';
import { parseId } from './commands/shared.js';
import { handleValidateCommand } from './commands/validate.js';

function readPackageVersion(): string {
  const packageJsonPath = path.join(__dirname, '..', 'package.json');
  const packageJson: unknown = JSON.parse(readFileSync(packageJsonPath, 'utf-8'));
  if (typeof packageJson === 'object' && packageJson !== null && 'version' in packageJson) {
    return String(packageJson.version);
  }
  return '0.0.0';
}

function collect(value: string, previous: string[]): string[] {
  return [...previous, value];
}

function positiveInteger(name: string) {
  return (value: string): number => {
    const parsed = parseInt(value, 10);
    if (isNaN(parsed) || parsed < 1) {
      throw new InvalidArgumentError(`${name} must be a positive integer`);
    }
    return parsed;
  };
}

const FORMAT_HELP = 'Output format: text (human-readable), json (structured), raw (Unix pipes)';

/**
 * Create and configure the CLI program
 */
export function createProgram(): Command {
  const program = new Command();

  program
    .name('cms-engine')
    .description('Compose articles from atoms, substitute variables and render through a cache')
    .version(readPackageVersion());

  program
    .command('render')
    .description('Render an article, directly or through a collection')
    .option('-c, --content <path>', 'Content directory containing content.yaml', '.')
    .requiredOption('--client <id>', 'Client (tenant) id', value => parseId(value, '--client'))
    .option('-a, --article <id>', 'Article id', value => parseId(value, '--article'))
    .option('--collection <id>', 'Collection id', value => parseId(value, '--collection'))
    .option('-u, --url <url>', 'Url of the article within the collection')
    .option('--var <tag=value>', 'Cacheable variable (repeatable)', collect, [])
    .option('--request-var <tag=value>', 'Uncacheable, per-request variable (repeatable)', collect, [])
    .option('--raw', 'Emit atom content without applying type templates', false)
    .option('--repeat <n>', 'Render n times to exercise the render cache', positiveInteger('repeat'), 1)
    .option('--format <format>', FORMAT_HELP, 'text')
    .option('-v, --verbose', 'Enable verbose output', false)
    .action(handleRenderCommand);

  program
    .command('menu')
    .description('List the navigation entries of a menu')
    .option('-c, --content <path>', 'Content directory containing content.yaml', '.')
    .requiredOption('--client <id>', 'Client (tenant) id', value => parseId(value, '--client'))
    .requiredOption('-m, --menu <id>', 'Menu id', value => parseId(value, '--menu'))
    .option('--format <format>', FORMAT_HELP, 'text')
    .action(handleMenuCommand);

  program
    .command('collection')
    .description('Show the articles and menus of a collection')
    .option('-c, --content <path>', 'Content directory containing content.yaml', '.')
    .requiredOption('--client <id>', 'Client (tenant) id', value => parseId(value, '--client'))
    .requiredOption('--collection <id>', 'Collection id', value => parseId(value, '--collection'))
    .option('--format <format>', FORMAT_HELP, 'text')
    .action(handleCollectionCommand);

  program
    .command('validate')
    .description('Check content files for missing references, broken templates and clashing urls')
    .option('-c, --content <path>', 'Content directory containing content.yaml', '.')
    .option('--format <format>', FORMAT_HELP, 'text')
    .action(handleValidateCommand);

  program
    .command('help', { isDefault: true })
    .description('Display help information')
    .action(() => {
      program.outputHelp();
    });

  return program;
}

/**
 * Parse command line arguments and execute
 */
export async function run(argv: string[] = process.argv): Promise<void> {
  const program = createProgram();
  await program.parseAsync(argv);
}
