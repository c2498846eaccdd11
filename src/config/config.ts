/**
 * svgpicture configuration
 *
 * Manages the config file at ~/.svgpicture/config.json.
 * Supports environment variable overrides.
 */

import fs from 'fs';
import path from 'path';
import os from 'os';
import { ConfigurationError } from '../errors/index.js';
import { defaultFontTables } from './font-tables.js';

export const OUTPUT_METHODS = ['latex-pdf', 'latex-eps', 'pdf', 'eps'] as const;

/**
 * `latex-*` writes the background image plus a LaTeX overlay;
 * the plain kinds only export the whole drawing.
 */
export type OutputMethod = (typeof OUTPUT_METHODS)[number];

export interface SvgPictureConfig {
  renderer: {
    /** Inkscape executable. Default: `inkscape` from $PATH */
    inkscapePath: string;
  };
  fonts: {
    /** SVG font-family → LaTeX family tag (rm | sf | tt) */
    fontFamilies: Record<string, string>;
    /** SVG font-size → LaTeX size command */
    fontSizes: Record<string, string>;
  };
  output: {
    /** Default: latex-pdf */
    method: OutputMethod;
    /** Directory for artifacts. Default: beside each input */
    outDir?: string;
    /** Documents converted at once in batch mode. Default: 2 */
    concurrency: number;
  };
}

export function isOutputMethod(value: string): value is OutputMethod {
  return (OUTPUT_METHODS as readonly string[]).includes(value);
}

export class ConfigManager {
  private readonly configPath: string;

  constructor(configPath?: string) {
    this.configPath = configPath ?? path.join(os.homedir(), '.svgpicture', 'config.json');
  }

  get filePath(): string {
    return this.configPath;
  }

  /**
   * Load config from disk. Returns defaults if file doesn't exist.
   */
  load(): SvgPictureConfig {
    if (!fs.existsSync(this.configPath)) {
      return ConfigManager.defaults();
    }
    try {
      const raw = fs.readFileSync(this.configPath, 'utf-8');
      const parsed = JSON.parse(raw) as Partial<SvgPictureConfig>;
      return this.merge(ConfigManager.defaults(), parsed);
    } catch (err) {
      throw new ConfigurationError(`Failed to read config at ${this.configPath}: ${(err as Error).message}`, {
        path: this.configPath,
      });
    }
  }

  /**
   * Save config to disk, creating parent directories as needed.
   */
  save(config: SvgPictureConfig): void {
    const dir = path.dirname(this.configPath);
    if (!fs.existsSync(dir)) {
      fs.mkdirSync(dir, { recursive: true });
    }
    fs.writeFileSync(this.configPath, JSON.stringify(config, null, 2) + '\n', 'utf-8');
  }

  /**
   * Validate a config object. Returns errors array; empty means valid.
   */
  validate(config: Partial<SvgPictureConfig>): { valid: boolean; errors: string[] } {
    const errors: string[] = [];

    if (config.renderer !== undefined && !config.renderer.inkscapePath) {
      errors.push('renderer.inkscapePath must be a non-empty path');
    }

    const method = config.output?.method;
    if (method !== undefined && !isOutputMethod(method)) {
      errors.push(`output.method must be ${OUTPUT_METHODS.join(' | ')}, got: ${method}`);
    }

    const concurrency = config.output?.concurrency;
    if (concurrency !== undefined && (!Number.isInteger(concurrency) || concurrency < 1)) {
      errors.push(`output.concurrency must be a positive integer, got: ${concurrency}`);
    }

    for (const [family, tag] of Object.entries(config.fonts?.fontFamilies ?? {})) {
      if (!['rm', 'sf', 'tt'].includes(tag)) {
        errors.push(`fonts.fontFamilies["${family}"] must be rm | sf | tt, got: ${tag}`);
      }
    }

    for (const [size, command] of Object.entries(config.fonts?.fontSizes ?? {})) {
      if (!/^\\[A-Za-z]+$/.test(command)) {
        errors.push(`fonts.fontSizes["${size}"] must be a LaTeX size command such as \\small, got: ${command}`);
      }
    }

    return { valid: errors.length === 0, errors };
  }

  /**
   * Load config, then apply environment variable overrides.
   *
   * Supported env vars:
   *   SVGPICTURE_INKSCAPE, SVGPICTURE_METHOD, SVGPICTURE_OUT_DIR,
   *   SVGPICTURE_CONCURRENCY
   */
  loadWithEnvOverrides(): SvgPictureConfig {
    const config = this.load();

    if (process.env.SVGPICTURE_INKSCAPE) config.renderer.inkscapePath = process.env.SVGPICTURE_INKSCAPE;

    const method = process.env.SVGPICTURE_METHOD;
    if (method) {
      if (!isOutputMethod(method)) {
        throw new ConfigurationError(`SVGPICTURE_METHOD must be ${OUTPUT_METHODS.join(' | ')}, got: ${method}`);
      }
      config.output.method = method;
    }

    if (process.env.SVGPICTURE_OUT_DIR) config.output.outDir = process.env.SVGPICTURE_OUT_DIR;
    if (process.env.SVGPICTURE_CONCURRENCY) {
      config.output.concurrency = parseInt(process.env.SVGPICTURE_CONCURRENCY, 10);
    }

    return config;
  }

  /**
   * Return a default configuration.
   */
  static defaults(): SvgPictureConfig {
    return {
      renderer: {
        inkscapePath: 'inkscape',
      },
      fonts: defaultFontTables(),
      output: {
        method: 'latex-pdf',
        concurrency: 2,
      },
    };
  }

  /** Merge source into target; font tables extend the defaults entry by entry. */
  private merge(target: SvgPictureConfig, source: Partial<SvgPictureConfig>): SvgPictureConfig {
    const result = { ...target };
    if (source.renderer) result.renderer = { ...target.renderer, ...source.renderer };
    if (source.fonts) {
      result.fonts = {
        fontFamilies: { ...target.fonts.fontFamilies, ...source.fonts.fontFamilies },
        fontSizes: { ...target.fonts.fontSizes, ...source.fonts.fontSizes },
      };
    }
    if (source.output) result.output = { ...target.output, ...source.output };
    return result;
  }
}
