import path from 'path';
import * as fs from 'fs/promises';
import { Command } from 'commander';
import { ConfigLoader } from '@constify/core';
import { scanLiterals, SourceWalker } from '@constify/repo';
import { OutputRenderer, ScanEntry } from '../output/renderer';
import type { CliRuntime } from '../runtime';
import type { GlobalFlags } from './refactor';
import { normalizeExtensions } from './flags';

interface ScanFlags {
  ext?: string[];
  exclude?: string[];
}

export function registerScanCommand(program: Command, runtime: CliRuntime) {
  program
    .command('scan')
    .argument('<root>', 'Root directory of the code base')
    .description('List source files and their literal counts without calling any service')
    .option('--ext <extensions...>', 'File extensions to process')
    .option('--exclude <patterns...>', 'Directory names or ignore patterns to skip')
    .action(async (rootArg: string, options: ScanFlags) => {
      const globalOpts: GlobalFlags = program.opts();
      const renderer = new OutputRenderer(!!globalOpts.json);
      const root = path.resolve(rootArg);

      const config = ConfigLoader.load({
        configPath: globalOpts.config,
        flags: {
          scan: { extensions: normalizeExtensions(options.ext), excludes: options.exclude },
        },
        cwd: root,
        env: runtime.env,
      });

      const fileSet = await new SourceWalker().collect(root, {
        extensions: config.scan.extensions,
        excludes: config.scan.excludes,
        maxFileSize: config.scan.maxFileSizeBytes,
      });

      const warnings = [...fileSet.warnings];
      const files: ScanEntry[] = [];
      for (const file of fileSet.files) {
        let source: string;
        try {
          source = await fs.readFile(file.absPath, 'utf8');
        } catch (error) {
          warnings.push(`Cannot read ${file.path}: ${String(error)}`);
          continue;
        }
        const scan = scanLiterals(source);
        files.push({ path: file.path, literals: scan.spans.length, malformed: scan.malformed });
      }

      renderer.renderScan({ root, files, warnings });
    });
}
