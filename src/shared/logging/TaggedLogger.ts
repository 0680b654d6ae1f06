/**
 * TaggedLogger - `[Tag] message` console logging.
 *
 * - info: verbose일 때만 console.log
 * - warn / error: 항상 출력
 * - 모든 라인은 onLog 콜백으로도 전달된다 (로딩 화면, 디버거 등)
 */

export interface TaggedLoggerOptions {
    /** console.log 출력 여부 (warn/error는 항상 출력) */
    verbose?: boolean;

    /** 로그 라인 구독 */
    onLog?: (line: string) => void;
}

export class TaggedLogger {
    private readonly tag: string;
    private readonly options: TaggedLoggerOptions;

    constructor(tag: string, options: TaggedLoggerOptions = {}) {
        this.tag = tag;
        this.options = options;
    }

    /**
     * 같은 출력 설정을 공유하는 다른 태그의 logger
     */
    child(tag: string): TaggedLogger {
        return new TaggedLogger(tag, this.options);
    }

    format(message: string): string {
        return `[${this.tag}] ${message}`;
    }

    info(message: string): void {
        const line = this.format(message);
        this.options.onLog?.(line);
        if (this.options.verbose) {
            console.log(line);
        }
    }

    warn(message: string, ...details: unknown[]): void {
        const line = this.format(message);
        this.options.onLog?.(line);
        console.warn(line, ...details);
    }

    error(message: string, ...details: unknown[]): void {
        const line = this.format(message);
        this.options.onLog?.(line);
        console.error(line, ...details);
    }
}
