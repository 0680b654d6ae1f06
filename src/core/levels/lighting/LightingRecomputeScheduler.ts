/**
 * LightingRecomputeScheduler - 조명 재계산 job을 한 번에 하나만 실행한다.
 *
 * Job 흐름:
 *   blocked(ACTIVATING 레벨 존재)가 풀릴 때까지 대기 → 1 tick yield → recompute() await
 *
 * - job 실행 중 들어온 요청은 합쳐서 job 종료 후 정확히 한 번 더 실행한다.
 * - recompute() 실패는 로그만 남기고 다음 요청을 막지 않는다.
 */

import { yieldTick } from '../../../shared/async/Deferred';
import { TaggedLogger } from '../../../shared/logging/TaggedLogger';
import { toError } from '../errors/LevelErrors';
import type { LightingRecomputer } from './LightingRecomputer';

/** listener를 등록하고 해제 함수를 반환 */
export type BlockChangeSubscription = (listener: () => void) => () => void;

export class LightingRecomputeScheduler {
    private readonly lighting: LightingRecomputer;
    private readonly isBlocked: () => boolean;
    private readonly subscribeBlockChanges: BlockChangeSubscription;
    private readonly log: TaggedLogger;

    private job: Promise<void> | null = null;
    private rerunRequested = false;
    private disposed = false;
    private wake: (() => void) | null = null;
    private _completedRuns = 0;

    constructor(
        lighting: LightingRecomputer,
        isBlocked: () => boolean,
        subscribeBlockChanges: BlockChangeSubscription,
        log: TaggedLogger = new TaggedLogger('LightingRecompute')
    ) {
        this.lighting = lighting;
        this.isBlocked = isBlocked;
        this.subscribeBlockChanges = subscribeBlockChanges;
        this.log = log;
    }

    get isRunning(): boolean {
        return this.job !== null;
    }

    get completedRuns(): number {
        return this._completedRuns;
    }

    request(): void {
        if (this.disposed) return;
        if (this.job) {
            this.rerunRequested = true;
            return;
        }
        this.job = this.run();
    }

    /** 실행 중인 job(후속 실행 포함)이 끝나면 resolve */
    whenIdle(): Promise<void> {
        return this.job ?? Promise.resolve();
    }

    private async run(): Promise<void> {
        try {
            do {
                this.rerunRequested = false;
                await this.waitUntilUnblocked();
                if (this.disposed) return;

                await yieldTick();
                if (this.disposed) return;

                try {
                    await this.lighting.recompute();
                    this._completedRuns++;
                    this.log.info(`Recomputed lighting (run ${this._completedRuns})`);
                } catch (err) {
                    this.log.error('Lighting recompute failed', toError(err));
                }
            } while (this.rerunRequested && !this.disposed);
        } finally {
            this.job = null;
        }
    }

    private waitUntilUnblocked(): Promise<void> {
        if (!this.isBlocked()) return Promise.resolve();

        return new Promise((resolve) => {
            const finish = (): void => {
                unsubscribe();
                this.wake = null;
                resolve();
            };
            const unsubscribe = this.subscribeBlockChanges(() => {
                if (!this.isBlocked()) finish();
            });
            this.wake = finish;
        });
    }

    dispose(): void {
        this.disposed = true;
        this.rerunRequested = false;
        this.wake?.();
    }
}
