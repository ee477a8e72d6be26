import chalk from 'chalk';
import { Command } from 'commander';
import { BlobwalkValidationError } from '../../core/errors/BlobwalkValidationError.js';
import { BlobwalkRuntimeError } from '../../core/errors/BlobwalkRuntimeError.js';
import { toError } from '../../core/errors/conversion.js';
import { DEFAULT_GLOB } from '../../core/loaders/filesystem/schemas.js';
import { handleCountCommand } from './commands/count.js';
import { handleListCommand } from './commands/list.js';
import { handleLoadCommand } from './commands/load.js';

/**
 * Print a command failure and mark the process as failed.
 */
export function reportCommandError(command: string, error: unknown): void {
    if (error instanceof BlobwalkValidationError) {
        console.error(chalk.red(`❌ blobwalk ${command}: invalid options`));
        for (const issue of error.errors) {
            console.error(chalk.red(`   - ${issue.message}`));
        }
    } else if (error instanceof BlobwalkRuntimeError) {
        console.error(chalk.red(`❌ blobwalk ${command}: ${error.message}`));
        if (error.recovery) {
            console.error(chalk.gray(`   ${error.recovery}`));
        }
    } else {
        console.error(chalk.red(`❌ blobwalk ${command} failed: ${toError(error).message}`));
    }
    process.exitCode = 1;
}

function addWalkOptions(command: Command): Command {
    return command
        .option('-g, --glob <pattern>', 'glob pattern relative to <dir>', DEFAULT_GLOB)
        .option('-s, --suffix <suffix...>', 'keep only files with these extensions (e.g. .txt)')
        .option('-x, --exclude <pattern...>', 'glob patterns to skip')
        .option('-v, --verbose', 'log traversal details to stderr', false);
}

export function createProgram(version: string): Command {
    const program = new Command();

    program
        .name('blobwalk')
        .description('Enumerate files under a directory as blobs')
        .version(version);

    addWalkOptions(
        program.command('count').description('Count matching files').argument('<dir>')
    ).action(async (dir: string, opts: Record<string, unknown>) => {
        try {
            await handleCountCommand(dir, opts);
        } catch (err) {
            reportCommandError('count', err);
        }
    });

    addWalkOptions(
        program.command('list').description('List matching files lazily').argument('<dir>')
    )
        .option('-n, --limit <count>', 'stop after this many files')
        .option('--json', 'print one JSON object per line', false)
        .action(async (dir: string, opts: Record<string, unknown>) => {
            try {
                await handleListCommand(dir, opts);
            } catch (err) {
                reportCommandError('list', err);
            }
        });

    addWalkOptions(
        program.command('load').description('Read every matching file').argument('<dir>')
    )
        .option('-p, --progress', 'show a progress spinner', false)
        .action(async (dir: string, opts: Record<string, unknown>) => {
            try {
                const summary = await handleLoadCommand(dir, opts);
                if (summary.failed > 0) {
                    process.exitCode = 1;
                }
            } catch (err) {
                reportCommandError('load', err);
            }
        });

    return program;
}
