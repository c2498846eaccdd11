/**
 * Basic Usage Example
 *
 * Converts one drawing into figure.pdf + figure.pdf_tex and prints the
 * labels that ended up in the overlay.
 *
 *   \def\svgwidth{\columnwidth}
 *   \input{figure.pdf_tex}
 */

import { ConfigManager, InkscapeRenderer, ProgressReporter, SvgConverter } from '../src/index.js';
import dotenv from 'dotenv';

dotenv.config();

async function main() {
  const input = process.argv[2] ?? 'figure.svg';
  const config = new ConfigManager().loadWithEnvOverrides();

  // 1. Wire the converter to Inkscape
  const converter = new SvgConverter({
    renderer: new InkscapeRenderer({ executable: config.renderer.inkscapePath }),
    fonts: config.fonts,
    reporter: new ProgressReporter(),
  });

  // 2. Look at what will be typeset by LaTeX
  const extracted = await converter.extract(input);
  for (const label of extracted.labels) {
    console.log(label.kind === 'styled' ? label.text : label.markup);
  }

  // 3. Convert
  const result = await converter.convert(input, { method: 'latex-pdf' });
  console.log(`Wrote ${result.artifactPath} and ${result.markupPath}`);
}

main().catch((err) => {
  console.error(err instanceof Error ? err.message : String(err));
  process.exitCode = 1;
});
