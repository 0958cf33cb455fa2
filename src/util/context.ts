import { AsyncLocalStorage } from 'async_hooks';
import { randomBytes } from 'crypto';

/** What a unit of background work is about, for log correlation. */
export interface JobContext {
    jobId: string;
    /** The page or slug the job is working on. */
    subject?: string;
}

const storage = new AsyncLocalStorage<JobContext>();

export function currentJob(): JobContext | undefined {
    return storage.getStore();
}

export function runInJob<T>(subject: string | undefined, callback: () => T): T {
    return storage.run({ jobId: randomBytes(3).toString('hex'), subject }, callback);
}
