#!/usr/bin/env node

import * as fs from 'fs';
import * as path from 'path';
import { squarifyFile } from './processor';
import {
  configExists,
  generateDefaultConfig,
  getConfigPath,
  getOutputPath,
  writeConfig,
} from './config';
import { describeError } from './errors';
import { isRemoteSource } from './image-codec';

async function main() {
  const args = process.argv.slice(2);

  if (args.length === 0 || args.length > 2) {
    console.error('Usage: squarify <image-file-or-url> [output.png]');
    process.exit(1);
  }

  const source = args[0];

  if (!isRemoteSource(source) && !fs.existsSync(source)) {
    console.error(`Error: Image file not found: ${source}`);
    process.exit(1);
  }

  try {
    // Remote images keep their config and output in the working directory
    const dir = isRemoteSource(source) ? process.cwd() : path.dirname(source);
    const configFilepath = getConfigPath(source, dir);
    const outputFilepath = args[1] ?? getOutputPath(source, dir);

    if (!configExists(configFilepath)) {
      writeConfig(configFilepath, generateDefaultConfig());
      console.log(`Wrote ${configFilepath} with default options, edit and re-run to change them`);
    }

    await squarifyFile(source, configFilepath, outputFilepath);
  } catch (error) {
    console.error(`Error: ${describeError(error)}`);
    process.exit(1);
  }
}

main().catch((error) => {
  console.error('Fatal error:', error);
  process.exit(1);
});
