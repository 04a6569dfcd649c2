import { IActivityRepository } from '../../application/ports/IActivityRepository.js';
import { IEventDispatcher } from '../../application/ports/IEventDispatcher.js';

export type HealthStatus = 'ok' | 'warning' | 'error';

export interface HealthReport {
    status: HealthStatus;
    checks: {
        registry: string;
        dispatcher: string;
    };
    timestamp: string;
}

export interface HealthResult {
    statusCode: number;
    body: HealthReport;
}

export class HealthController {
    constructor(
        private activityRepository: IActivityRepository,
        private eventDispatcher: IEventDispatcher
    ) { }

    async handle(): Promise<HealthResult> {
        const report: HealthReport = {
            status: 'ok',
            checks: {
                registry: 'unknown',
                dispatcher: 'unknown',
            },
            timestamp: new Date().toISOString(),
        };

        // 1. Registry must have been seeded
        const activityCount = await this.activityRepository.count();
        if (activityCount > 0) {
            report.checks.registry = `loaded (${activityCount} activities)`;
        } else {
            report.status = 'error';
            report.checks.registry = 'empty';
        }

        // 2. Roster changes should be audited
        const subscriberCount = this.eventDispatcher.getSubscriberCount();
        if (subscriberCount > 0) {
            report.checks.dispatcher = `active (${subscriberCount} subscribers)`;
        } else {
            if (report.status === 'ok') {
                report.status = 'warning';
            }
            report.checks.dispatcher = 'no-subscribers';
        }

        return {
            statusCode: report.status === 'error' ? 503 : 200,
            body: report,
        };
    }
}
