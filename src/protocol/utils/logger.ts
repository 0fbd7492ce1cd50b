type LogLevel = 'debug' | 'info' | 'warn' | 'error';

const colors = {
    reset: '\x1b[0m',
    dim: '\x1b[2m',
    red: '\x1b[31m',
    green: '\x1b[32m',
    yellow: '\x1b[33m',
    cyan: '\x1b[36m',
};

const levelColors: Record<LogLevel, string> = {
    debug: colors.dim,
    info: colors.green,
    warn: colors.yellow,
    error: colors.red,
};

const levelIcons: Record<LogLevel, string> = {
    debug: '🔍',
    info: '✅',
    warn: '⚠️',
    error: '❌',
};

const levelRank: Record<LogLevel | 'silent', number> = {
    debug: 0,
    info: 1,
    warn: 2,
    error: 3,
    silent: 4,
};

function isThreshold(value: string | undefined): value is LogLevel | 'silent' {
    return value !== undefined && Object.hasOwn(levelRank, value);
}

// LOG_LEVEL: debug | info | warn | error | silent (default info)
function thresholdFromEnv(): number {
    const raw = process.env.LOG_LEVEL?.toLowerCase();
    return isThreshold(raw) ? levelRank[raw] : levelRank.info;
}

class Logger {
    private context: string;

    constructor(context: string = 'App') {
        this.context = context;
    }

    private log(level: LogLevel, message: string, ...args: unknown[]): void {
        if (levelRank[level] < thresholdFromEnv()) return;

        const timestamp = new Date().toISOString();
        const color = levelColors[level];
        const icon = levelIcons[level];

        // warn and error to stderr
        const write = levelRank[level] >= levelRank.warn ? console.error : console.log;
        write(
            `${colors.dim}${timestamp}${colors.reset} ${icon} ${color}[${level.toUpperCase()}]${colors.reset} ${colors.cyan}[${this.context}]${colors.reset} ${message}`,
            ...args
        );
    }

    debug(message: string, ...args: unknown[]): void {
        this.log('debug', message, ...args);
    }

    info(message: string, ...args: unknown[]): void {
        this.log('info', message, ...args);
    }

    warn(message: string, ...args: unknown[]): void {
        this.log('warn', message, ...args);
    }

    error(message: string, ...args: unknown[]): void {
        this.log('error', message, ...args);
    }

    child(context: string): Logger {
        return new Logger(`${this.context}:${context}`);
    }
}

export const logger = new Logger('AMM');
