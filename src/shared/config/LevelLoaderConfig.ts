/**
 * LevelLoaderConfig - 레벨 로더 공통 설정.
 *
 * 우선순위: overrides > 환경 변수 > 기본값
 *
 * Environment:
 *   LEVEL_LOADER_VERBOSE=1      - info 로그를 console에 출력
 *   LEVEL_LOADER_BOOTSTRAP=name - bootstrap segment 이름 변경
 */

export interface LevelLoaderConfig {
    /** 프로세스 시작 시 존재하는 bootstrap segment */
    bootstrapSegment: string;

    /** Persistent container TransformNode 이름 */
    persistentContainerName: string;

    /** info 로그 출력 */
    verbose: boolean;
}

export const DEFAULT_LEVEL_LOADER_CONFIG: Readonly<LevelLoaderConfig> = {
    bootstrapSegment: 'bootstrap',
    persistentContainerName: 'PersistentContainer',
    verbose: false,
} as const;

const TRUTHY_FLAGS = new Set(['1', 'true', 'yes', 'on']);

export function isFlagEnabled(value: string | undefined): boolean {
    if (value === undefined) return false;
    return TRUTHY_FLAGS.has(value.trim().toLowerCase());
}

export function resolveLevelLoaderConfig(
    overrides: Partial<LevelLoaderConfig> = {},
    env: NodeJS.ProcessEnv = process.env
): LevelLoaderConfig {
    const bootstrapFromEnv = env.LEVEL_LOADER_BOOTSTRAP?.trim();

    return {
        bootstrapSegment:
            overrides.bootstrapSegment ??
            (bootstrapFromEnv ? bootstrapFromEnv : DEFAULT_LEVEL_LOADER_CONFIG.bootstrapSegment),
        persistentContainerName:
            overrides.persistentContainerName ?? DEFAULT_LEVEL_LOADER_CONFIG.persistentContainerName,
        verbose: overrides.verbose ?? isFlagEnabled(env.LEVEL_LOADER_VERBOSE),
    };
}
