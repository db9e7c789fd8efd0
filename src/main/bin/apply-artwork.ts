#!/usr/bin/env node
import { runApplyArtworkCli } from '../cli/apply-artwork-cli.js';
import log from '../logger.js';

runApplyArtworkCli(process.argv.slice(2))
  .then((code) => {
    process.exitCode = code;
  })
  .catch((error) => {
    log.error(error);
    process.exitCode = 2;
  });
