import pino from 'pino';
import { loadConfig } from './env.js';

const config = loadConfig();
const level = config.log.level;

// stdout carries the CLI's scored output, so log lines go to stderr
export const logger =
    process.env.NODE_ENV !== 'production' && process.env.NODE_ENV !== 'test'
        ? pino({
            name: 'acuity-triage',
            level,
            transport: {
                target: 'pino-pretty',
                options: {
                    colorize: true,
                    translateTime: 'SYS:standard',
                    ignore: 'pid,hostname',
                    destination: 2,
                },
            },
        })
        : pino(
            {
                name: 'acuity-triage',
                level,
            },
            process.stderr,
        );
