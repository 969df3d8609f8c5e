import { Command, CommanderError } from 'commander';
import { ExitCode, OutputFormat, ScanOptions, ScanReport, ScanResult } from './types';
import { ScanError, errorMessage, isScanError } from './errors';
import { LoadOptions, loadManifests } from './loader';
import { ResourceScanner } from './scanner';
import { calculateSummary, getExitCode } from './utils/scorer';
import { createPalette, formatHumanReport, formatJsonReport, writeReport } from './utils/reporter';

export const NAME = 'k8s-danger-scan';
export const VERSION = '1.0.0';

const EXIT_CODES_HELP = `
Exit Codes:
  0  No findings
  1  Medium risk only
  2  At least one high risk
  3  Error occurred

Examples:
  ${NAME} scan ./manifests
  ${NAME} scan deployment.yaml --include-medium
  ${NAME} diff old.yaml new.yaml
  ${NAME} scan . --json --include-medium
`;

/** Where the CLI writes. Swapped out in tests. */
export interface CliIO {
  stdout: (text: string) => void;
  stderr: (text: string) => void;
  color: boolean;
}

export const processIO: CliIO = {
  stdout: text => process.stdout.write(text),
  stderr: text => process.stderr.write(text),
  color: process.stdout.isTTY === true,
};

/**
 * Failed writes to a real stream (EPIPE when the reader goes away) surface as
 * 'error' events after the write call has returned, never as exceptions.
 */
export function watchOutputErrors(stream: NodeJS.EventEmitter, onError: (err: ScanError) => void): void {
  stream.on('error', (err: unknown) => {
    onError(new ScanError('OUTPUT_FAILED', `failed to write report: ${errorMessage(err)}`, { cause: err }));
  });
}

interface CommandFlags {
  json?: boolean;
  includeMedium?: boolean;
}

function toScanOptions(flags: CommandFlags): ScanOptions {
  const format: OutputFormat = flags.json ? 'json' : 'human';
  return { includeMedium: flags.includeMedium === true, format };
}

function loadWithContext(paths: readonly string[], context: string, loadOptions?: LoadOptions) {
  try {
    return loadManifests(paths, loadOptions);
  } catch (err) {
    if (isScanError(err)) throw err.withContext(context);
    throw err;
  }
}

export function runScan(paths: readonly string[], options: ScanOptions = {}, loadOptions?: LoadOptions): ScanResult {
  const resources = loadWithContext(paths, 'failed to parse files', loadOptions);
  const result = new ResourceScanner(options).scan(resources);

  if (result.resourcesScanned === 0) {
    throw new ScanError('NO_RESOURCES', 'no supported Kubernetes resources found in specified paths');
  }
  return result;
}

export function runDiff(oldPath: string, newPath: string, options: ScanOptions = {}, loadOptions?: LoadOptions): ScanResult {
  const oldResources = loadWithContext([oldPath], 'failed to parse old manifest', loadOptions);
  const newResources = loadWithContext([newPath], 'failed to parse new manifest', loadOptions);
  const result = new ResourceScanner(options).diff(oldResources, newResources);

  // one empty side is a legitimate diff (everything added or everything removed)
  if (result.resourcesScanned === 0) {
    throw new ScanError('NO_RESOURCES', 'no supported Kubernetes resources found in either manifest set');
  }
  return result;
}

export function buildReport(result: ScanResult): ScanReport {
  return { summary: calculateSummary(result.findings), findings: result.findings };
}

/** Run one command, render the report, map the outcome to an exit code. */
function execute(io: CliIO, options: ScanOptions, run: () => ScanResult): ExitCode {
  const palette = createPalette(io.color);
  try {
    const result = run();
    const report = buildReport(result);
    const text = options.format === 'json' ? formatJsonReport(report) : formatHumanReport(report, palette);
    writeReport(text, io.stdout);
    return getExitCode(result.findings);
  } catch (err) {
    io.stderr(palette.red(`Error: ${errorMessage(err)}`) + '\n');
    return ExitCode.ERROR;
  }
}

export function createProgram(io: CliIO, onExit: (code: ExitCode) => void): Command {
  const program = new Command();

  program
    .name(NAME)
    .description('Detect catastrophic Kubernetes misconfigurations')
    .version(`${NAME} version ${VERSION}`, '-v, --version', 'Show version')
    .exitOverride()
    .configureOutput({
      writeOut: str => io.stdout(str),
      writeErr: str => io.stderr(str),
    })
    .addHelpText('after', EXIT_CODES_HELP);

  program
    .command('scan')
    .description('Scan manifest files or directories')
    .argument('<paths...>', 'Manifest files or directories (walked for .yaml/.yml)')
    .option('--json', 'Output in JSON format')
    .option('--include-medium', 'Include MEDIUM severity findings (default: HIGH only)')
    .action((paths: string[], flags: CommandFlags) => {
      const options = toScanOptions(flags);
      onExit(execute(io, options, () => runScan(paths, options)));
    });

  program
    .command('diff')
    .description('Compare manifests and show new risks only')
    .argument('<old>', 'Baseline manifest file or directory')
    .argument('<new>', 'Changed manifest file or directory')
    .option('--json', 'Output in JSON format')
    .option('--include-medium', 'Include MEDIUM severity findings (default: HIGH only)')
    .allowExcessArguments(false)
    .action((oldPath: string, newPath: string, flags: CommandFlags) => {
      const options = toScanOptions(flags);
      onExit(execute(io, options, () => runDiff(oldPath, newPath, options)));
    });

  return program;
}

/**
 * Parse arguments (without the node and script entries), run the command,
 * and return the process exit code.
 */
export function main(argv: readonly string[], io: CliIO = processIO): ExitCode {
  let exitCode: ExitCode = ExitCode.ERROR;
  const program = createProgram(io, code => {
    exitCode = code;
  });

  try {
    program.parse([...argv], { from: 'user' });
  } catch (err) {
    if (!(err instanceof CommanderError)) throw err;
    // --version and --help
    if (err.exitCode === 0) return ExitCode.OK;
    // bare invocation: commander has already printed the usage
    if (err.code !== 'commander.help') {
      program.outputHelp({ error: true });
    }
    return ExitCode.ERROR;
  }
  return exitCode;
}
