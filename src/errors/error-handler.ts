/**
 * svgpicture error handler
 *
 * Converts thrown values to user-facing messages and wraps async
 * conversions with structured error handling.
 */

import {
  SvgPictureError,
  ParseError,
  RendererFailureError,
  MissingInputFileError,
  ConfigurationError,
} from './svgpicture-error.js';

export { SvgPictureError } from './svgpicture-error.js';

export class ErrorHandler {
  /**
   * Convert any thrown value to a user-facing message that names the
   * offending input, attribute or value.
   */
  static toUserMessage(err: unknown): string {
    if (err instanceof MissingInputFileError) {
      return `Input file not found: ${err.path}`;
    }
    if (err instanceof RendererFailureError) {
      if (err.exitCode != null) {
        return `${err.message} (exit code ${err.exitCode})`;
      }
      return `${err.message}. Is Inkscape installed? Set SVGPICTURE_INKSCAPE to its path.`;
    }
    if (err instanceof ParseError && err.attribute !== undefined) {
      return `${err.message} (${err.code}, attribute "${err.attribute}")`;
    }
    if (err instanceof ConfigurationError) {
      return `${err.message}. Run \`svgpicture config validate\` for details.`;
    }
    if (err instanceof SvgPictureError) {
      return `${err.message} (${err.code})`;
    }
    if (err instanceof Error) {
      return err.message;
    }
    return 'An unexpected error occurred.';
  }

  /**
   * Wrap an async function with structured error handling.
   * Never throws; failures are returned as { error }.
   */
  static async wrap<T>(
    fn: () => Promise<T>,
    context?: Record<string, unknown>
  ): Promise<{ data?: T; error?: SvgPictureError }> {
    try {
      const data = await fn();
      return { data };
    } catch (err) {
      if (err instanceof SvgPictureError) {
        return { error: err };
      }
      const wrapped = new SvgPictureError(
        err instanceof Error ? err.message : String(err),
        'UNKNOWN_ERROR',
        context
      );
      return { error: wrapped };
    }
  }
}
