// pattern: Imperative Shell
// Entry point: npm run cli -- <command> ...

import { loadConfig } from '../src/lib/config';
import { VideoMediaSource } from '../src/lib/video-media-source';
import { runCli } from './program';

const exitCode = await runCli(process.argv.slice(2), {
  out: (line) => process.stdout.write(`${line}\n`),
  err: (line) => process.stderr.write(`${line}\n`),
  createSource: () => VideoMediaSource.fromConfig(loadConfig()),
});

process.exitCode = exitCode;
