import { DeckError } from '../shared/errors';
import { HELP_TEXT, parseCliArgs } from './config';
import { generateDeckFiles } from './services';
import { logger } from './utils/logger';

const SCOPE = 'dobble-deck';

/**
 * Run the CLI with the given arguments.
 * @returns the process exit code
 */
export async function main(argv: readonly string[], cwd: string = process.cwd()): Promise<number> {
  try {
    const command = parseCliArgs(argv, cwd);
    if (command.kind === 'help') {
      console.log(HELP_TEXT);
      return 0;
    }

    await generateDeckFiles(command.config);
    return 0;
  } catch (error) {
    if (error instanceof DeckError) {
      logger.error(SCOPE, `[${error.code}] ${error.message}`);
    } else {
      logger.error(SCOPE, 'Unexpected error:', error instanceof Error ? error.stack : error);
    }
    return 1;
  }
}
