/**
 * Async helpers for transition bookkeeping.
 *
 * 규칙:
 * - Deferred는 resolve만 한다. 실패는 값(결과 객체, handle.error)으로 전달한다.
 * - 아무도 await하지 않은 Promise가 reject되어 프로세스가 죽는 일이 없어야 한다.
 */

export interface Deferred<T> {
    readonly promise: Promise<T>;
    readonly settled: boolean;
    resolve(value: T): void;
}

export function createDeferred<T>(): Deferred<T> {
    let resolveFn: (value: T) => void = () => undefined;
    let settled = false;
    const promise = new Promise<T>((resolve) => {
        resolveFn = resolve;
    });

    return {
        promise,
        get settled(): boolean {
            return settled;
        },
        resolve(value: T): void {
            if (settled) return;
            settled = true;
            resolveFn(value);
        },
    };
}

/**
 * Yield one macrotask (setTimeout 0).
 * Node에는 RAF가 없으므로 "다음 프레임" 대신 사용한다.
 */
export function yieldTick(): Promise<void> {
    return new Promise((resolve) => {
        setTimeout(resolve, 0);
    });
}
