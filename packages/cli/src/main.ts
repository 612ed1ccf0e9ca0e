// permsync entry point

import { bundle } from '@permsync/repositories';
import { runCli } from './cli.js';

process.exitCode = await runCli(process.argv.slice(2), {
  env: process.env,
  reader: bundle.createFilesystemReader(),
  writer: bundle.createFilesystemWriter(),
  print: (text) => console.log(text),
});
