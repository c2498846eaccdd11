/**
 * svgpicture Output Formatter
 *
 * Formats conversion results, extracted labels and errors into
 * human-readable strings for CLI output.
 */

import { ErrorHandler, SvgPictureError } from '../errors/index.js';
import type { BatchResult, ConversionResult } from '../converter/index.js';
import type { ExtractedDocument } from '../extractor/index.js';
import { describeSize } from '../extractor/index.js';
import type { Label } from '../labels/index.js';

const LINE = '─'.repeat(60);
const DIM = '\x1b[2m';
const BOLD = '\x1b[1m';
const GREEN = '\x1b[32m';
const YELLOW = '\x1b[33m';
const RED = '\x1b[31m';
const RESET = '\x1b[0m';

function header(title: string): string {
  return `\n${BOLD}${title}${RESET}\n${LINE}`;
}

function field(label: string, value: string | number | undefined): string {
  if (value === undefined) return '';
  return `  ${DIM}${label.padEnd(22)}${RESET}${value}`;
}

function describeLabel(label: Label): string {
  const at = `(${label.position.x}, ${label.position.y})`;
  if (label.kind === 'opaque') {
    return `${at} textext ${label.markup}`;
  }
  const [r, g, b] = label.color;
  const parts = [
    `${at} "${label.text}"`,
    label.fontFamily,
    String(label.fontWeight),
    label.fontStyle,
    label.align,
  ];
  if (label.fontSize !== undefined) parts.push(label.fontSize);
  if (r !== 0 || g !== 0 || b !== 0) parts.push(`rgb(${r},${g},${b})`);
  if (label.rotation !== 0) parts.push(`rotated ${label.rotation}°`);
  return parts.join(' ');
}

export class OutputFormatter {
  /**
   * Format one successful conversion.
   */
  formatConversion(result: ConversionResult): string {
    const lines: string[] = [header(`Converted ${result.input}`)];
    lines.push(field('Method', result.method));
    lines.push(field('Artifact', result.artifactPath));
    lines.push(field('Markup', result.markupPath));
    if (result.markupPath !== undefined) lines.push(field('Labels', result.labelCount));
    if (result.warnings.length) lines.push(field('Warnings', `${YELLOW}${result.warnings.length}${RESET}`));
    lines.push(field('Duration', `${result.durationMs}ms`));
    return lines.filter(Boolean).join('\n');
  }

  /**
   * Summarize a batch: one line per document, then totals.
   */
  formatBatchResults(results: BatchResult[]): string {
    if (!results.length) {
      return `${YELLOW}No documents converted.${RESET}`;
    }
    const lines: string[] = [header(`Conversions (${results.length})`)];
    for (const r of results) {
      if (r.success && r.result) {
        const outputs = [r.result.artifactPath, r.result.markupPath].filter(Boolean).join(', ');
        lines.push(`  ${GREEN}✓${RESET} ${r.input} ${DIM}→ ${outputs}${RESET}`);
      } else {
        const reason = r.error ? ErrorHandler.toUserMessage(r.error) : 'Unknown failure';
        lines.push(`  ${RED}✗${RESET} ${r.input} ${DIM}${reason}${RESET}`);
      }
    }
    const failed = results.filter((r) => !r.success).length;
    lines.push(LINE);
    lines.push(`  ${results.length - failed} succeeded, ${failed} failed`);
    return lines.join('\n');
  }

  /**
   * List the labels a dry run would place, in document order.
   */
  formatExtraction(input: string, extracted: ExtractedDocument): string {
    const lines: string[] = [header(`Labels in ${input} (${extracted.labels.length})`)];
    lines.push(field('Size', describeSize(extracted.size)));
    lines.push(field('Consumed elements', extracted.consumedIds.size));
    lines.push(field('Ignored elements', extracted.ignoredIds.size));
    extracted.labels.forEach((label, i) => {
      lines.push(`  ${DIM}${String(i + 1).padStart(3)}.${RESET} ${describeLabel(label)}`);
    });
    for (const warning of extracted.warnings) {
      lines.push(`  ${YELLOW}⚠${RESET} ${warning.message}`);
    }
    return lines.filter(Boolean).join('\n');
  }

  /**
   * Format an error into a friendly, actionable message.
   */
  formatError(error: unknown): string {
    const lines = [`\n${RED}${BOLD}Error:${RESET} ${ErrorHandler.toUserMessage(error)}`];

    const code = error instanceof SvgPictureError ? error.code : undefined;
    if (code === 'UNSUPPORTED_COLOR') {
      lines.push(`${YELLOW}Hint:${RESET} Convert fill colors to #rrggbb in the editor before exporting.`);
    } else if (code === 'PARSE_ERROR') {
      lines.push(`${YELLOW}Hint:${RESET} Only matrix, translate, scale and rotate transforms are understood.`);
    } else if (code === 'RECONCILIATION_ERROR') {
      lines.push(`${YELLOW}Hint:${RESET} The drawing may be empty. Check that the document contains visible geometry.`);
    } else if (error instanceof Error) {
      const msg = error.message.toLowerCase();
      if (msg.includes('eacces') || msg.includes('permission denied')) {
        lines.push(`${YELLOW}Hint:${RESET} Permission denied. Check that the output directory is writable.`);
      }
    }

    return lines.join('\n');
  }
}
