import pino from 'pino';
import env from './env';

import { getSessionId } from './context';

// Every line logged inside a scrape session carries its id.
const logger = pino({
    level: env.LOG_LEVEL,
    mixin() {
        const sessionId = getSessionId();
        return sessionId ? { sessionId } : {};
    },
    transport: {
        target: 'pino-pretty',
        options: {
            colorize: true,
            translateTime: 'SYS:standard',
            ignore: 'pid,hostname'
        }
    }
});

export default logger;
