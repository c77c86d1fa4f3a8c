import { CronJob } from 'cron';
import { logger } from '../utils/Logger';
import { SessionStore } from '../core/SessionStore';

export class SessionSweepJob {
    private job: CronJob;

    constructor(private sessions: SessionStore, cronTime: string) {
        this.job = new CronJob(cronTime, () => {
            this.run();
        });
    }

    start() {
        this.job.start();
        logger.info('[SessionSweep] Started.');
    }

    stop() {
        this.job.stop();
    }

    run(): number {
        const removed = this.sessions.prune();
        if (removed > 0) {
            logger.info(`[SessionSweep] Evicted ${removed} idle sessions (${this.sessions.size} active).`);
        }
        return removed;
    }
}
