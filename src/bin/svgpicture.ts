#!/usr/bin/env node
/**
 * svgpicture CLI entry point
 *
 * Compiled to dist/bin/svgpicture.js by TypeScript.
 * Registered as the `svgpicture` binary in package.json.
 */

import dotenv from 'dotenv';
import { SvgPictureCLI } from '../cli/cli.js';

dotenv.config();

const cli = new SvgPictureCLI();
cli.run(process.argv).catch((err) => {
  console.error('Fatal error:', err instanceof Error ? err.message : String(err));
  process.exit(1);
});
