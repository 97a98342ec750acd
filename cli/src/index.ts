import { parseArgs, hasFlag } from './lib/parse.js';
import type { ParsedFlags } from './lib/parse.js';
import { displayError, EXIT_SUCCESS, EXIT_USAGE } from './lib/errors.js';
import { printError, printHint, printBlank, bold, dim, cyan, showCursor } from './lib/output.js';

import * as backupCmd from './commands/backup.js';
import * as packCmd from './commands/pack.js';
import * as syncCmd from './commands/sync.js';
import * as restoreCmd from './commands/restore.js';
import * as unpackCmd from './commands/unpack.js';
import * as statusCmd from './commands/status.js';
import * as configCmd from './commands/config.js';

type CommandModule = { run: (args: string[], flags: ParsedFlags) => Promise<number> };

const commandMap = {
  backup: backupCmd,
  pack: packCmd,
  sync: syncCmd,
  restore: restoreCmd,
  unpack: unpackCmd,
  status: statusCmd,
  config: configCmd,
} satisfies Record<string, CommandModule>;

type Command = keyof typeof commandMap;

function isCommand(name: string): name is Command {
  return Object.hasOwn(commandMap, name);
}

const CLI_VERSION = process.env.ZIPVAULT_CLI_VERSION || '1.0.0';

function printVersion(): void {
  console.log(`zipvault-cli v${CLI_VERSION}`);
}

const TRANSFER_OPTIONS = [
  `    --simple-url <url>        Simple backend base URL`,
  `    --chunked-url <url>       Chunked backend base URL`,
  `    --force-simple            Prefer the simple backend whenever a part fits`,
  `    --force-chunked           Skip the simple backend`,
  `    --workers <n>             Parallel transfers ${dim('default: 3')}`,
  `    --retries <n>             Retries per transfer ${dim('default: 5')}`,
  `    --state-dir <dir>         Where transfer state is kept`,
];

function printHelp(): void {
  console.log();
  console.log(`  ${bold('zipvault')} ${dim(`v${CLI_VERSION}`)}`);
  console.log(`  ${dim('Back up folders as size-capped ZIP parts to HTTP object storage.')}`);
  console.log();
  console.log(`  ${bold('Usage:')}`);
  console.log(`    zipvault ${cyan('<command>')} [options]`);
  console.log();
  console.log(`  ${bold('Commands:')}`);
  console.log(`    ${cyan('backup')}     Pack a folder and upload its parts`);
  console.log(`    ${cyan('pack')}       Pack a folder into ZIP parts on disk`);
  console.log(`    ${cyan('sync')}       Upload new and changed files of a folder`);
  console.log(`    ${cyan('restore')}    Download a backup job and unpack it`);
  console.log(`    ${cyan('unpack')}     Extract local ZIP parts into a folder`);
  console.log(`    ${cyan('status')}     Show what has been backed up`);
  console.log(`    ${cyan('config')}     Manage CLI configuration`);
  console.log();
  console.log(`  ${bold('Global Options:')}`);
  console.log(`    --no-color       Disable colored output`);
  console.log(`    --quiet          Suppress non-essential output`);
  console.log(`    --json           Output results as JSON`);
  console.log(`    --version        Show CLI version`);
  console.log(`    --help           Show this help text`);
  console.log();
  console.log(`  ${bold('Examples:')}`);
  console.log(`    ${dim('# Configure a backend')}`);
  console.log(`    zipvault config set simple-url https://storage.example.com`);
  console.log(`    zipvault config set token <token>`);
  console.log();
  console.log(`    ${dim('# Back up a folder in parts of at most 500 MB')}`);
  console.log(`    zipvault backup ~/Photos --ceiling-mb 500`);
  console.log();
  console.log(`    ${dim('# Restore it elsewhere')}`);
  console.log(`    zipvault restore 20260102_030405_12345 ./restored`);
  console.log();
}

function printCommandHelp(command: Command): void {
  console.log();
  switch (command) {
    case 'backup':
      console.log(`  ${bold('zipvault backup')} - Pack a folder and upload its parts`);
      console.log();
      console.log(`  ${bold('Usage:')}`);
      console.log(`    zipvault backup <dir> [options]`);
      console.log();
      console.log(`  ${bold('Options:')}`);
      console.log(`    --ceiling-mb <n>          Largest part size in MB ${dim('default: 1900')}`);
      console.log(`    --compression-level <n>   0 (store) to 9 ${dim('default: 6')}`);
      console.log(`    --keep-parts              Keep the local parts after upload`);
      for (const line of TRANSFER_OPTIONS) console.log(line);
      console.log(`    --quiet                   Only print the job id`);
      console.log(`    --json                    Output result as JSON`);
      break;

    case 'pack':
      console.log(`  ${bold('zipvault pack')} - Pack a folder into ZIP parts on disk`);
      console.log();
      console.log(`  ${bold('Usage:')}`);
      console.log(`    zipvault pack <dir> [options]`);
      console.log();
      console.log(`  ${bold('Options:')}`);
      console.log(`    -o, --out <dir>           Where the job directory is created ${dim('default: current dir')}`);
      console.log(`    --name <name>             Part name prefix ${dim('default: folder name')}`);
      console.log(`    --ceiling-mb <n>          Largest part size in MB ${dim('default: 1900')}`);
      console.log(`    --compression-level <n>   0 (store) to 9 ${dim('default: 6')}`);
      console.log(`    --quiet                   Only print the output directory`);
      console.log(`    --json                    Output result as JSON`);
      break;

    case 'sync':
      console.log(`  ${bold('zipvault sync')} - Upload new and changed files of a folder`);
      console.log();
      console.log(`  ${bold('Usage:')}`);
      console.log(`    zipvault sync <dir> [options]`);
      console.log();
      console.log(`  ${bold('Options:')}`);
      console.log(`    --use-sha256              Also compare file contents, not only size and time`);
      for (const line of TRANSFER_OPTIONS) console.log(line);
      console.log(`    --json                    Output result as JSON`);
      break;

    case 'restore':
      console.log(`  ${bold('zipvault restore')} - Download a backup job and unpack it`);
      console.log();
      console.log(`  ${bold('Usage:')}`);
      console.log(`    zipvault restore <jobId> <dest> [options]`);
      console.log();
      console.log(`  ${bold('Options:')}`);
      for (const line of TRANSFER_OPTIONS) console.log(line);
      console.log(`    --json                    Output result as JSON`);
      break;

    case 'unpack':
      console.log(`  ${bold('zipvault unpack')} - Extract local ZIP parts into a folder`);
      console.log();
      console.log(`  ${bold('Usage:')}`);
      console.log(`    zipvault unpack <part.zip...> --dest <dir>`);
      console.log();
      console.log(`  ${dim('Parts are applied in the order given; later parts win.')}`);
      break;

    case 'status':
      console.log(`  ${bold('zipvault status')} - Show what has been backed up`);
      console.log();
      console.log(`  ${bold('Usage:')}`);
      console.log(`    zipvault status [--state-dir <dir>] [--json]`);
      break;

    case 'config':
      console.log(`  ${bold('zipvault config')} - Manage CLI configuration`);
      console.log();
      console.log(`  ${bold('Usage:')}`);
      console.log(`    zipvault config <action> [key] [value]`);
      console.log();
      console.log(`  ${bold('Actions:')}`);
      console.log(`    set <key> <value>         Set a configuration value`);
      console.log(`    get <key>                 Get a configuration value`);
      console.log(`    unset <key>               Restore a key to its default`);
      console.log(`    list                      Show all configuration`);
      console.log(`    reset                     Reset to defaults`);
      console.log(`    path                      Show config file location`);
      console.log();
      console.log(`  ${bold('Keys:')}`);
      console.log(`    simple-url, chunked-url   Backend base URLs`);
      console.log(`    token                     Bearer token ${dim('ZIPVAULT_TOKEN overrides it')}`);
      console.log(`    enable-simple             Use the simple backend ${dim('default: true')}`);
      console.log(`    enable-chunked            Use the chunked backend ${dim('default: true')}`);
      console.log(`    force-simple              Prefer the simple backend ${dim('default: false')}`);
      console.log(`    force-chunked             Skip the simple backend ${dim('default: false')}`);
      console.log(`    simple-limit-mb           Simple backend object limit ${dim('default: 50')}`);
      console.log(`    chunked-limit-mb          Chunked backend object limit ${dim('default: 2000')}`);
      console.log(`    ceiling-mb                Largest archive part ${dim('default: 1900')}`);
      console.log(`    workers, retries          Transfer concurrency and retries ${dim('default: 3, 5')}`);
      console.log(`    compression-level         Deflate level 0-9 ${dim('default: 6')}`);
      console.log(`    use-sha256                Hash files during sync ${dim('default: false')}`);
      console.log(`    state-dir                 Transfer state directory`);
      break;
  }
  console.log();
}

async function main(): Promise<void> {
  const { command, args, flags } = parseArgs(process.argv);

  // Global flags
  if (hasFlag(flags, 'version', 'v')) {
    printVersion();
    process.exit(EXIT_SUCCESS);
  }

  if (!command) {
    printHelp();
    process.exit(EXIT_SUCCESS);
  }

  if (!isCommand(command)) {
    printError(`Unknown command: "${command}"`);
    printHint('Run "zipvault --help" to see available commands.');
    printBlank();
    process.exit(EXIT_USAGE);
  }

  // Command-level help
  if (hasFlag(flags, 'help', 'h')) {
    printCommandHelp(command);
    process.exit(EXIT_SUCCESS);
  }

  try {
    const mod: CommandModule = commandMap[command];
    const exitCode = await mod.run(args, flags);
    process.exit(exitCode);
  } catch (err) {
    showCursor();
    const exitCode = displayError(err);
    printBlank();
    process.exit(exitCode);
  }
}

// Ensure cursor is restored on exit
process.on('exit', () => showCursor());
process.on('uncaughtException', (err) => {
  showCursor();
  displayError(err);
  printBlank();
  process.exit(1);
});

main().catch((err: unknown) => {
  showCursor();
  displayError(err);
  printBlank();
  process.exit(1);
});
