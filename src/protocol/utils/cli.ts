/**
 * CLI Formatting Utility
 *
 * Terminal output using chalk, boxen, and figures, with log-symbols
 * falling back for terminals without Unicode.
 */

import chalk from 'chalk';
import boxen, { Options as BoxenOptions } from 'boxen';
import figures from 'figures';
import logSymbols from 'log-symbols';

// ==================== SYMBOLS ====================

export const sym = {
    success: logSymbols.success,
    error: logSymbols.error,
    warning: logSymbols.warning,
    info: logSymbols.info,

    arrow: figures.arrowRight,
    pointer: figures.pointer,
    bullet: figures.bullet,

    // Custom emojis (no fallback)
    rocket: '🚀',
    lightning: '⚡',
    gem: '💎',
    drop: '💧',
    gear: '⚙️',
    key: '🔑',
    check: '✅',
    warning_emoji: '⚠️',
};

// ==================== COLORS ====================

export const c = {
    primary: chalk.cyan,
    success: chalk.green,
    error: chalk.red,
    warning: chalk.yellow,
    info: chalk.blue,

    bold: chalk.bold,
    dim: chalk.dim,

    heading: chalk.bold.cyan,
    label: chalk.gray,
    value: chalk.white,
    highlight: chalk.bold.yellow,
};

// ==================== BOX STYLES ====================

const defaultBoxStyle: BoxenOptions = {
    padding: 1,
    borderStyle: 'round',
    borderColor: 'cyan',
};

export function successBox(content: string, title?: string): string {
    return boxen(content, {
        ...defaultBoxStyle,
        borderColor: 'green',
        title: title || `${sym.success} Success`,
        titleAlignment: 'center',
    });
}

export function errorBox(content: string, title?: string): string {
    return boxen(content, {
        ...defaultBoxStyle,
        borderColor: 'red',
        title: title || `${sym.error} Error`,
        titleAlignment: 'center',
    });
}

export function warningBox(content: string, title?: string): string {
    return boxen(content, {
        ...defaultBoxStyle,
        borderColor: 'yellow',
        title: title || `${sym.warning} Warning`,
        titleAlignment: 'center',
    });
}

export function infoBox(content: string, title?: string): string {
    return boxen(content, {
        ...defaultBoxStyle,
        borderColor: 'blue',
        title: title || `${sym.info} Info`,
        titleAlignment: 'center',
    });
}

/**
 * Product header
 */
export function header(title: string, emoji: string = sym.gem): string {
    const text = c.heading(`${emoji} AMM Exchange · ${title}`);
    return boxen(text, {
        padding: { top: 0, bottom: 0, left: 2, right: 2 },
        borderStyle: 'round',
        borderColor: 'cyan',
    });
}

/**
 * Aligned "label: value" lines for box content
 */
export function rows(entries: Array<[string, string]>): string {
    const width = Math.max(...entries.map(([label]) => label.length)) + 1;
    return entries
        .map(([label, value]) => `${c.label(`${label}:`.padEnd(width))} ${c.value(value)}`)
        .join('\n');
}

// ==================== MESSAGES ====================

export function success(msg: string): void {
    console.log(`${sym.success} ${c.success(msg)}`);
}

export function error(msg: string): void {
    console.log(`${sym.error} ${c.error(msg)}`);
}

export function warn(msg: string): void {
    console.log(`${sym.warning} ${c.warning(msg)}`);
}

export function info(msg: string): void {
    console.log(`${sym.info} ${c.info(msg)}`);
}

// ==================== EXPORTS ====================

export default {
    sym,
    c,
    successBox,
    errorBox,
    warningBox,
    infoBox,
    header,
    rows,
    success,
    error,
    warn,
    info,
};
