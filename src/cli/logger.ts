import chalk from 'chalk';
import type { Reporter } from '../lib/index.js';

export const symbols = {
  fail: chalk.red('✖'),
  warn: chalk.yellow('⚠'),
};

export function heading(title: string) {
  console.log('\n' + chalk.bold.blue(title));
}

/** Lightweight render helpers to avoid scattered console.log formatting */
export const render = {
  line(msg = '') {
    console.log(msg);
  },
  warn(msg: string) {
    console.log(symbols.warn + ' ' + chalk.yellow(msg));
  },
  error(msg: string) {
    console.error(symbols.fail + ' ' + chalk.red(msg));
  },
};

/**
 * Reporter used by the CLI: reports go to stdout untouched so they stay
 * greppable, diagnostics are decorated.
 */
export const consoleReporter: Reporter = {
  out(message) {
    render.line(message);
  },
  err(message) {
    render.error(message);
  },
};
