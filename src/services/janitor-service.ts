/**
 * Cache janitor
 * @fileoverview Periodic maintenance: lock sweeping, statistics reports and
 * expiry/eviction passes over the cache directory
 */

import * as fs from 'fs/promises';
import * as path from 'path';
import { CACHE_CONFIG, JANITOR_CONFIG } from '../config/constants';
import { KeyLockRegistry } from '../cache/key-lock-registry';
import { errorMessage } from '../middleware/error-handler';
import { Logger, logger as defaultLogger } from '../middleware/logging';

const MB = 1024 * 1024;
const HOUR_MS = 60 * 60 * 1000;

export interface JanitorSettings {
    printStats: boolean;
    cacheClean: boolean;
    dryRun: boolean;
    maxCacheFiles: number;
    maxCacheSizeMb: number;
    maxAgeHours: number;
}

export interface JanitorOptions {
    cacheDir: string;
    registry: KeyLockRegistry;
    settings: JanitorSettings;
    logger?: Logger;
    clock?: () => number;
    tickIntervalMs?: number;
}

/**
 * Outcome of one clean pass. In dry-run mode the removal lists name what
 * would have been removed.
 */
export interface CleanSummary {
    scanned: number;
    kept: string[];
    expired: string[];
    orphans: string[];
    evicted: string[];
}

interface ScoredFile {
    name: string;
    sizeMb: number;
    ageHours: number;
    usedHours: number;
    score: number;
}

function emptySummary(): CleanSummary {
    return { scanned: 0, kept: [], expired: [], orphans: [], evicted: [] };
}

export class JanitorService {
    private readonly cacheDir: string;
    private readonly registry: KeyLockRegistry;
    private readonly settings: JanitorSettings;
    private readonly logger: Logger;
    private readonly clock: () => number;
    private readonly tickIntervalMs: number;
    private timer: NodeJS.Timeout | null = null;
    private ticks = 0;
    private cleaning: Promise<CleanSummary> | null = null;

    constructor(options: JanitorOptions) {
        this.cacheDir = options.cacheDir;
        this.registry = options.registry;
        this.settings = options.settings;
        this.logger = options.logger ?? defaultLogger;
        this.clock = options.clock ?? Date.now;
        this.tickIntervalMs = options.tickIntervalMs ?? JANITOR_CONFIG.TICK_INTERVAL_MS;
    }

    get tickCount(): number {
        return this.ticks;
    }

    get running(): boolean {
        return this.timer !== null;
    }

    /**
     * Run an initial clean pass (when enabled) and start the tick timer
     */
    async start(): Promise<void> {
        if (this.timer) {
            return;
        }

        if (this.settings.cacheClean) {
            await this.clean();
        }

        this.timer = setInterval(() => {
            this.tick().catch(error => {
                this.logger.error('Janitor tick failed', { error: errorMessage(error) });
            });
        }, this.tickIntervalMs);
        this.timer.unref();
    }

    stop(): void {
        if (this.timer) {
            clearInterval(this.timer);
            this.timer = null;
        }
    }

    async tick(): Promise<void> {
        this.ticks++;

        if (this.ticks % JANITOR_CONFIG.STATS_EVERY_TICKS === 0) {
            await this.reportStats();
        }

        if (this.ticks % JANITOR_CONFIG.CLEAN_EVERY_TICKS === 0 && this.settings.cacheClean) {
            await this.clean();
        }

        if (this.settings.printStats) {
            this.registry.totals.report(this.logger);
        }
    }

    /**
     * Sweep idle lock entries and, when enabled, report per-key statistics
     */
    async reportStats(): Promise<void> {
        const { active, expired } = await this.registry.sweepIdle(CACHE_CONFIG.LOCK_IDLE_MS);

        if (!this.settings.printStats) {
            return;
        }
        for (const entry of active) {
            entry.stats.report(this.logger);
        }
        for (const entry of expired) {
            entry.stats.report(this.logger, ' (expired)');
        }
    }

    /**
     * One expiry and eviction pass. A pass already in progress is joined
     * rather than started again.
     */
    clean(): Promise<CleanSummary> {
        if (!this.cleaning) {
            this.cleaning = this.runClean().finally(() => {
                this.cleaning = null;
            });
        }
        return this.cleaning;
    }

    private async runClean(): Promise<CleanSummary> {
        this.logger.info('Cleaning cache', { cacheDir: this.cacheDir, dryRun: this.settings.dryRun });
        const summary = emptySummary();

        let names: string[];
        try {
            const entries = await fs.readdir(this.cacheDir, { withFileTypes: true });
            names = entries
                .filter(entry => entry.isFile() && !entry.name.endsWith(CACHE_CONFIG.META_SUFFIX))
                .map(entry => entry.name);
        } catch (error) {
            this.logger.error('Error reading cache directory', { cacheDir: this.cacheDir, error: errorMessage(error) });
            return summary;
        }

        const now = this.clock();
        const scored: ScoredFile[] = [];
        let totalSizeMb = 0;

        for (const name of names) {
            summary.scanned++;
            const file = await this.scoreFile(name, now, summary);
            if (file) {
                scored.push(file);
                totalSizeMb += file.sizeMb;
            }
        }

        scored.sort((a, b) => a.score - b.score);

        const { maxCacheFiles, maxCacheSizeMb } = this.settings;
        this.logger.info(
            `cache size: ${totalSizeMb.toFixed(1)}/${maxCacheSizeMb.toFixed(1)}MB ` +
            `(${scored.length}/${maxCacheFiles} files)`
        );

        if (scored.length <= maxCacheFiles && totalSizeMb <= maxCacheSizeMb) {
            summary.kept = scored.map(file => file.name);
            return summary;
        }

        let runningCount = 0;
        let runningSizeMb = 0;
        for (const file of scored) {
            runningCount++;
            runningSizeMb += file.sizeMb;

            if (runningCount <= maxCacheFiles && runningSizeMb <= maxCacheSizeMb) {
                summary.kept.push(file.name);
                continue;
            }

            this.logger.info(
                `${this.settings.dryRun ? 'would remove' : 'removing'} ${file.name}`,
                {
                    ageHours: Number(file.ageHours.toFixed(1)),
                    sizeMb: Number(file.sizeMb.toFixed(1)),
                    usedHours: Number(file.usedHours.toFixed(1)),
                    files: `${runningCount}/${maxCacheFiles}`,
                    size: `${runningSizeMb.toFixed(1)}/${maxCacheSizeMb}MB`,
                    score: Number(file.score.toFixed(3))
                }
            );
            summary.evicted.push(file.name);
            if (!this.settings.dryRun) {
                await this.removePair(file.name);
            }
        }

        return summary;
    }

    /**
     * Stat one content file and its sidecar. Orphans and expired files are
     * handled here and yield null.
     */
    private async scoreFile(name: string, now: number, summary: CleanSummary): Promise<ScoredFile | null> {
        const contentPath = path.join(this.cacheDir, name);

        let content: { size: number; mtimeMs: number };
        try {
            content = await fs.stat(contentPath);
        } catch (error) {
            this.logger.warn('Error reading file info', { name, error: errorMessage(error) });
            return null;
        }

        let meta: { mtimeMs: number; isFile(): boolean } | null = null;
        try {
            meta = await fs.stat(`${contentPath}${CACHE_CONFIG.META_SUFFIX}`);
        } catch (error) {
            this.logger.warn('Error reading meta info', { name, error: errorMessage(error) });
        }

        if (!meta || !meta.isFile()) {
            this.logger.warn('Orphaned cache file', { name, dryRun: this.settings.dryRun });
            summary.orphans.push(name);
            if (!this.settings.dryRun) {
                await this.removePair(name);
            }
            return null;
        }

        const sizeMb = content.size / MB;
        const ageHours = (now - content.mtimeMs) / HOUR_MS;
        const { maxAgeHours, dryRun } = this.settings;

        if (maxAgeHours > 0 && ageHours > maxAgeHours) {
            this.logger.info(
                `${dryRun ? 'would remove' : 'removing'} ${name} (age: ${ageHours.toFixed(1)}h > ${maxAgeHours.toFixed(1)}h)`
            );
            summary.expired.push(name);
            if (!dryRun) {
                await this.removePair(name);
            }
            return null;
        }

        const usedHours = (now - meta.mtimeMs) / HOUR_MS;

        // Big old files without recent reads score higher
        return { name, sizeMb, ageHours, usedHours, score: sizeMb * ageHours * usedHours };
    }

    private async removePair(name: string): Promise<void> {
        const contentPath = path.join(this.cacheDir, name);
        for (const filePath of [contentPath, `${contentPath}${CACHE_CONFIG.META_SUFFIX}`]) {
            try {
                await fs.rm(filePath, { force: true });
            } catch (error) {
                this.logger.warn('Failed to remove cache file', { filePath, error: errorMessage(error) });
            }
        }
    }
}
