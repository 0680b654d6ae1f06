/**
 * LevelRegistry - 이름 → Level 조회.
 *
 * 정의는 생성 시점에 고정된다. 레벨 인스턴스는 orchestrator 수명 동안 재사용된다.
 */

import { ConfigurationError } from '../errors/LevelErrors';
import { Level, type LevelContext } from '../level/Level';
import type { LevelDefinition } from './LevelDefinition';

export class LevelRegistry {
    private readonly levels = new Map<string, Level>();

    /**
     * @throws ConfigurationError 이름 중복
     */
    constructor(definitions: readonly LevelDefinition[], context: LevelContext) {
        for (const definition of definitions) {
            if (this.levels.has(definition.name)) {
                throw new ConfigurationError(`Duplicate level name '${definition.name}'`, definition.name);
            }
            this.levels.set(definition.name, new Level(definition, context));
        }
    }

    get size(): number {
        return this.levels.size;
    }

    has(name: string): boolean {
        return this.levels.has(name);
    }

    get(name: string): Level | undefined {
        return this.levels.get(name);
    }

    find(predicate: (level: Level) => boolean): Level | undefined {
        for (const level of this.levels.values()) {
            if (predicate(level)) return level;
        }
        return undefined;
    }

    getAll(): Level[] {
        return Array.from(this.levels.values());
    }
}
