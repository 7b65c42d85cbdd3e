import type { ScheduledTask } from 'node-cron';
import cron from 'node-cron';

import type { OidcStore } from '../../db/repository/oidc.repository';
import type { Clock } from '../../types/crypto';
import type { Logger } from '../logger';

// ============================================================================
// TYPES
// ============================================================================

export interface CleanupSettings {
    enabled: boolean;
    /** Cron expression */
    schedule: string;
}

export interface CleanupReport {
    startedAt: Date;
    completedAt: Date;
    authorizationCodesDeleted: number;
    accessTokensDeleted: number;
    errors: string[];
}

function errorMessage(error: unknown): string {
    return error instanceof Error ? error.message : String(error);
}

// ============================================================================
// SCHEDULER
// ============================================================================

/**
 * Periodically deletes expired authorization codes and access tokens.
 */
export class CodeCleanupScheduler {
    private cronJob: ScheduledTask | null = null;
    private readonly log: Logger;

    constructor(
        private readonly store: OidcStore,
        private readonly settings: CleanupSettings,
        logger: Logger,
        private readonly clock: Clock = Date.now
    ) {
        this.log = logger.child({ module: 'cleanup' });
    }

    // ========================================================================
    // LIFECYCLE
    // ========================================================================

    get running(): boolean {
        return this.cronJob !== null;
    }

    start(): void {
        if (!this.settings.enabled) {
            this.log.info('Cleanup scheduler is disabled');
            return;
        }

        if (this.cronJob) {
            this.log.warn('Cleanup scheduler is already running');
            return;
        }

        this.cronJob = cron.schedule(this.settings.schedule, () => {
            this.runCleanup().catch((err: unknown) =>
                this.log.error({ err }, 'Cleanup run failed')
            );
        });

        this.log.info(
            { schedule: this.settings.schedule },
            'Cleanup scheduler started'
        );
    }

    stop(): void {
        if (this.cronJob) {
            this.cronJob.stop();
            this.cronJob = null;
            this.log.info('Cleanup scheduler stopped');
        }
    }

    // ========================================================================
    // CLEANUP
    // ========================================================================

    /**
     * Runs both phases. A failing phase is recorded in the report and does
     * not stop the other.
     */
    async runCleanup(): Promise<CleanupReport> {
        const startedAt = new Date(this.clock());
        const report: CleanupReport = {
            startedAt,
            completedAt: startedAt,
            authorizationCodesDeleted: 0,
            accessTokensDeleted: 0,
            errors: [],
        };

        try {
            report.authorizationCodesDeleted =
                await this.store.deleteExpiredAuthorizationCodes(startedAt);
        } catch (error) {
            this.log.error({ err: error }, 'Authorization code cleanup failed');
            report.errors.push(`authorization_codes: ${errorMessage(error)}`);
        }

        try {
            report.accessTokensDeleted =
                await this.store.deleteExpiredAccessTokens(startedAt);
        } catch (error) {
            this.log.error({ err: error }, 'Access token cleanup failed');
            report.errors.push(`access_tokens: ${errorMessage(error)}`);
        }

        report.completedAt = new Date(this.clock());

        this.log.info(
            {
                durationMs:
                    report.completedAt.getTime() - report.startedAt.getTime(),
                authorizationCodesDeleted: report.authorizationCodesDeleted,
                accessTokensDeleted: report.accessTokensDeleted,
                errors: report.errors.length > 0 ? report.errors : undefined,
            },
            'Cleanup completed'
        );

        return report;
    }
}
