import { ServiceError } from './errors';

/**
 * Race a lookup against a deadline. The timer is always cleared so a
 * settled lookup leaves nothing scheduled behind it.
 */
export async function withTimeout<T>(promise: Promise<T>, ms: number, source: string): Promise<T> {
    let timer: NodeJS.Timeout | undefined;

    const deadline = new Promise<never>((_, reject) => {
        timer = setTimeout(() => {
            reject(new ServiceError({ code: 'TIMEOUT', source, message: `${source} timed out after ${ms}ms` }));
        }, ms);
    });

    try {
        return await Promise.race([promise, deadline]);
    } finally {
        clearTimeout(timer);
    }
}
