import Logger from 'reggol';

export { Logger };

const logger = new Logger('judge');

/** Show debug output of every logger, used by `--verbose`. */
export function setVerbose(verbose: boolean) {
    Logger.levels.base = verbose ? 3 : 2;
}

export default logger;
