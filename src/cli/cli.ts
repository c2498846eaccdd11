/**
 * svgpicture CLI
 *
 * Commands:
 *   svgpicture convert <inputs...> [--method latex-pdf] [--out-dir dir] [--concurrency 2] [--dry-run] [--quiet]
 *   svgpicture config get [key]
 *   svgpicture config validate
 *   svgpicture config reset
 */

import { Command } from 'commander';
import { ConfigManager, OUTPUT_METHODS, isOutputMethod } from '../config/index.js';
import type { OutputMethod, SvgPictureConfig } from '../config/index.js';
import { BatchConverter, SvgConverter } from '../converter/index.js';
import { ConfigurationError } from '../errors/index.js';
import { InkscapeRenderer } from '../renderer/index.js';
import type { Renderer } from '../renderer/index.js';
import { OutputFormatter } from './formatter.js';
import { ProgressReporter } from './progress.js';

interface ConvertCommandOptions {
  method?: string;
  outDir?: string;
  concurrency?: string;
  dryRun?: boolean;
  quiet?: boolean;
}

/** Walk a dotted key such as `output.method` through plain objects. */
function lookup(root: unknown, key: string): unknown {
  let current: unknown = root;
  for (const part of key.split('.')) {
    if (typeof current !== 'object' || current === null) return undefined;
    current = new Map<string, unknown>(Object.entries(current)).get(part);
  }
  return current;
}

export class SvgPictureCLI {
  private readonly program: Command;
  private readonly formatter: OutputFormatter;
  private readonly configManager: ConfigManager;

  constructor(
    configManager: ConfigManager = new ConfigManager(),
    formatter: OutputFormatter = new OutputFormatter()
  ) {
    this.configManager = configManager;
    this.formatter = formatter;
    this.program = this.buildProgram();
  }

  /** Parse argv and execute the matching command. */
  async run(argv: string[]): Promise<void> {
    await this.program.parseAsync(argv);
  }

  // ─── Program builder ──────────────────────────────────────────────────────

  private buildProgram(): Command {
    const program = new Command('svgpicture')
      .version('0.1.0', '-V, --version', 'Print version')
      .description('Split SVG drawings into a background image and a LaTeX text overlay');

    // ── convert ────────────────────────────────────────────────────────────
    program
      .command('convert <inputs...>')
      .description('Convert SVG files into a background artifact plus LaTeX picture markup')
      .option('-m, --method <method>', `Output method: ${OUTPUT_METHODS.join('|')}`)
      .option('-o, --out-dir <dir>', 'Write artifacts here instead of beside each input')
      .option('-c, --concurrency <n>', 'Documents converted at once')
      .option('--dry-run', 'List the labels that would be placed without rendering')
      .option('-q, --quiet', 'Only print failures and warnings')
      .action(async (inputs: string[], opts: ConvertCommandOptions) => {
        try {
          const config = this.configManager.loadWithEnvOverrides();
          const reporter = new ProgressReporter(opts.quiet ?? false);
          const converter = new SvgConverter({
            renderer: this.createRenderer(config),
            fonts: config.fonts,
            reporter,
          });

          if (opts.dryRun) {
            for (const input of inputs) {
              const extracted = await converter.extract(input);
              console.log(this.formatter.formatExtraction(input, extracted));
            }
            return;
          }

          const method = this.resolveMethod(opts.method, config);
          const concurrency = this.resolveConcurrency(opts.concurrency, config);
          const outDir = opts.outDir ?? config.output.outDir;

          const batch = new BatchConverter(converter, reporter, concurrency);
          const results = await batch.processBatch(inputs.map((input) => ({ input, method, outDir })));
          if (!opts.quiet) {
            const [only] = results;
            console.log(
              results.length === 1 && only.result
                ? this.formatter.formatConversion(only.result)
                : this.formatter.formatBatchResults(results)
            );
          }
          if (results.some((r) => !r.success)) process.exitCode = 1;
        } catch (err) {
          console.error(this.formatter.formatError(err));
          process.exitCode = 1;
        }
      });

    // ── config ─────────────────────────────────────────────────────────────
    const config = program.command('config').description('Manage svgpicture configuration');

    config
      .command('get [key]')
      .description('Show the effective config or a single dotted key')
      .action((key?: string) => {
        try {
          const effective = this.configManager.loadWithEnvOverrides();
          if (!key) {
            console.log(JSON.stringify(effective, null, 2));
            return;
          }
          const value = lookup(effective, key);
          if (value === undefined) {
            console.error(`Key not found: ${key}`);
            process.exitCode = 1;
            return;
          }
          console.log(JSON.stringify(value, null, 2));
        } catch (err) {
          console.error(this.formatter.formatError(err));
          process.exitCode = 1;
        }
      });

    config
      .command('validate')
      .description('Validate the current configuration')
      .action(() => {
        try {
          const effective = this.configManager.loadWithEnvOverrides();
          const { valid, errors } = this.configManager.validate(effective);
          if (valid) {
            console.log('✅ Configuration is valid');
            return;
          }
          console.error('❌ Configuration has errors:');
          for (const error of errors) {
            console.error(`  - ${error}`);
          }
          process.exitCode = 1;
        } catch (err) {
          console.error(this.formatter.formatError(err));
          process.exitCode = 1;
        }
      });

    config
      .command('reset')
      .description('Reset configuration to defaults')
      .action(() => {
        try {
          this.configManager.save(ConfigManager.defaults());
          console.log(`✅ Configuration reset to defaults (${this.configManager.filePath})`);
        } catch (err) {
          console.error(this.formatter.formatError(err));
          process.exitCode = 1;
        }
      });

    return program;
  }

  // ─── Service adapters (swappable for testing) ─────────────────────────────

  protected createRenderer(config: SvgPictureConfig): Renderer {
    return new InkscapeRenderer({ executable: config.renderer.inkscapePath });
  }

  private resolveMethod(flag: string | undefined, config: SvgPictureConfig): OutputMethod {
    if (flag === undefined) return config.output.method;
    if (!isOutputMethod(flag)) {
      throw new ConfigurationError(`--method must be ${OUTPUT_METHODS.join(' | ')}, got: ${flag}`);
    }
    return flag;
  }

  private resolveConcurrency(flag: string | undefined, config: SvgPictureConfig): number {
    const value = flag === undefined ? config.output.concurrency : Number(flag);
    if (!Number.isInteger(value) || value < 1) {
      throw new ConfigurationError(`concurrency must be a positive integer, got: ${flag ?? value}`);
    }
    return value;
  }
}
