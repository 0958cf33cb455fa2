import pino from 'pino';
import env from './env';

import { currentJob } from './context';

const logger = pino({
    level: env.LOG_LEVEL,
    // Tag every line logged inside a job so concurrent enrichment output can be untangled
    mixin() {
        const job = currentJob();
        return job ? { jobId: job.jobId, subject: job.subject } : {};
    },
    transport: env.NODE_ENV === 'test' ? undefined : {
        target: 'pino-pretty',
        options: {
            colorize: true,
            translateTime: 'SYS:standard',
            ignore: 'pid,hostname'
        }
    }
});

export default logger;
