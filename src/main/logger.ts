import log from 'electron-log/node';

log.transports.file.level = false;
log.transports.console.level = 'info';
log.transports.console.format = '{text}';

export const setVerbose = (verbose: boolean): void => {
  log.transports.console.level = verbose ? 'verbose' : 'info';
};

export default log;
