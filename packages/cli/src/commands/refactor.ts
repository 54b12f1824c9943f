import path from 'path';
import { Command } from 'commander';
import { ConfigLoader, exitCodeFor, RefactorPipeline } from '@constify/core';
import { SourceWalker } from '@constify/repo';
import { createRewriteAdapter } from '@constify/adapters';
import {
  CommitPolicy,
  ConfigInput,
  ConsoleLogger,
  eventBase,
  JsonlLogger,
  Logger,
} from '@constify/shared';
import { OutputRenderer } from '../output/renderer';
import type { CliRuntime } from '../runtime';
import {
  normalizeEndpoint,
  normalizeExtensions,
  parseChoice,
  parseIntFlag,
  parseSecondsFlag,
} from './flags';

const VALIDATION_MODES = ['accept', 'warn', 'fatal'] as const;

export interface RefactorFlags {
  endpoint?: string;
  model?: string;
  apiKey?: string;
  provider?: string;
  ext?: string[];
  exclude?: string[];
  dryRun?: boolean;
  backup?: boolean;
  workers?: string;
  timeout?: string;
  retries?: string;
  backoff?: string;
  onUnchanged?: string;
  onLiteralsDropped?: string;
  logFile?: string;
}

export interface GlobalFlags {
  json?: boolean;
  config?: string;
  verbose?: boolean;
}

function policyFrom(options: RefactorFlags): CommitPolicy | undefined {
  // --dry-run wins over --backup
  if (options.dryRun) return 'dry-run';
  if (options.backup) return 'overwrite-with-backup';
  return undefined;
}

/**
 * Translates command line flags into a config layer. Unset flags stay
 * undefined so lower layers keep their values.
 */
export function flagsToConfig(options: RefactorFlags, globalOpts: GlobalFlags): ConfigInput {
  return {
    provider: {
      type: parseChoice('--provider', options.provider, ['openai', 'fake']),
      baseUrl: normalizeEndpoint(options.endpoint),
      model: options.model,
      api_key: options.apiKey,
    },
    run: {
      workers: parseIntFlag('--workers', options.workers),
      timeoutMs: parseSecondsFlag('--timeout', options.timeout),
      retries: parseIntFlag('--retries', options.retries),
      backoffMs: parseSecondsFlag('--backoff', options.backoff),
      policy: policyFrom(options),
    },
    scan: {
      extensions: normalizeExtensions(options.ext),
      excludes: options.exclude,
    },
    validation: {
      onUnchanged: parseChoice('--on-unchanged', options.onUnchanged, VALIDATION_MODES),
      onLiteralsDropped: parseChoice(
        '--on-literals-dropped',
        options.onLiteralsDropped,
        VALIDATION_MODES,
      ),
    },
    logging: {
      jsonlPath: options.logFile,
      verbose: globalOpts.verbose,
    },
  };
}

export function registerRefactorCommand(program: Command, runtime: CliRuntime) {
  program
    .command('refactor')
    .argument('<root>', 'Root directory of the code base')
    .description('Rewrite string literals into named constants')
    .option('--endpoint <url>', 'Base URL of an OpenAI-compatible API')
    .option('--model <name>', 'Model name to use')
    .option('--api-key <key>', 'Bearer token for the API (default: $API_KEY)')
    .option('--provider <type>', 'Rewrite provider: openai or fake')
    .option('--ext <extensions...>', 'File extensions to process')
    .option('--exclude <patterns...>', 'Directory names or ignore patterns to skip')
    .option('--dry-run', 'Write <file>.new instead of overwriting originals')
    .option('--backup', 'Keep originals as <file>.bak when overwriting')
    .option('--workers <n>', 'Number of files processed in parallel')
    .option('--timeout <seconds>', 'Per-request timeout')
    .option('--retries <n>', 'Attempts per file on transient errors')
    .option('--backoff <seconds>', 'Delay before the first retry; doubles on each retry')
    .option('--on-unchanged <mode>', 'Unchanged rewrite: accept, warn or fatal')
    .option('--on-literals-dropped <mode>', 'Rewrite without literals: accept, warn or fatal')
    .option('--log-file <path>', 'Append structured events to a JSONL file')
    .action(async (rootArg: string, options: RefactorFlags) => {
      const globalOpts: GlobalFlags = program.opts();
      const renderer = new OutputRenderer(!!globalOpts.json);
      const root = path.resolve(rootArg);

      const config = ConfigLoader.load({
        configPath: globalOpts.config,
        flags: flagsToConfig(options, globalOpts),
        cwd: root,
        env: runtime.env,
      });

      const logger: Logger = config.logging.jsonlPath
        ? new JsonlLogger(path.resolve(config.logging.jsonlPath), {
            verbose: config.logging.verbose,
          })
        : new ConsoleLogger({ verbose: config.logging.verbose });

      const runId = Date.now().toString();
      const fileSet = await new SourceWalker().collect(root, {
        extensions: config.scan.extensions,
        excludes: config.scan.excludes,
        maxFileSize: config.scan.maxFileSizeBytes,
      });
      await logger.log({
        type: 'FilesCollected',
        ...eventBase(runId),
        payload: { root, fileCount: fileSet.files.length, warnings: fileSet.warnings },
      });
      fileSet.warnings.forEach((w) => renderer.log(w));
      renderer.log(`Found ${fileSet.files.length} source files under ${root}`);

      const pipeline = new RefactorPipeline(
        { model: config.provider.model, run: config.run, validation: config.validation },
        { adapter: createRewriteAdapter(config.provider, runtime.env), logger },
      );

      const controller = new AbortController();
      const removeHandler = runtime.onInterrupt(() => {
        renderer.log('Interrupted: finishing files in flight, no new files will start.');
        controller.abort();
      });

      const total = fileSet.files.length;
      let done = 0;
      try {
        const summary = await pipeline.run(
          fileSet.files.map((f) => f.absPath),
          {
            runId,
            signal: controller.signal,
            onResult: (result) => renderer.renderProgress(++done, total, result, root),
          },
        );
        renderer.renderRun(summary, root);
        runtime.setExitCode(exitCodeFor(summary.results));
      } finally {
        removeHandler();
      }
    });
}
