#!/usr/bin/env node
import { runIncidentLogsCli } from '../cli/incident-logs-cli.js';
import log from '../logger.js';

runIncidentLogsCli(process.argv.slice(2))
  .then((code) => {
    process.exitCode = code;
  })
  .catch((error) => {
    log.error(error);
    process.exitCode = 2;
  });
