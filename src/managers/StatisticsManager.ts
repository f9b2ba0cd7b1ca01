import { Store } from '../database/Store';
import { JobStatus } from '../types/Job';
import { Tier } from '../types/User';

export interface SystemStats {
    totalUsers: number;
    usersByTier: Record<Tier, number>;
    jobsByStatus: Record<JobStatus, number>;
    deliveredDocuments: number;
}

export class StatisticsManager {
    private store: Store;

    constructor(store: Store) {
        this.store = store;
    }

    /**
     * Admin-level counts across all users and jobs
     */
    async getAdminStats(): Promise<SystemStats> {
        const [usersByTier, jobsByStatus] = await Promise.all([
            this.store.users.countByTier(),
            this.store.jobs.countByStatus()
        ]);

        return {
            totalUsers: usersByTier.free + usersByTier.pro,
            usersByTier,
            jobsByStatus,
            // Delivered jobs are closed once the user moves on
            deliveredDocuments: jobsByStatus.delivered + jobsByStatus.closed
        };
    }

    formatStats(stats: SystemStats): string {
        const statusLines = Object.entries(stats.jobsByStatus)
            .filter(([, count]) => count > 0)
            .map(([status, count]) => `  ${status}: ${count}`);

        return [
            'Bot statistics',
            `Users: ${stats.totalUsers} (free ${stats.usersByTier.free}, pro ${stats.usersByTier.pro})`,
            `Documents delivered or closed: ${stats.deliveredDocuments}`,
            'Jobs by status:',
            ...(statusLines.length > 0 ? statusLines : ['  none'])
        ].join('\n');
    }
}
