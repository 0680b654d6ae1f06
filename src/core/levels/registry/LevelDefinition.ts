/**
 * LevelDefinition - 외부에서 작성되는 레벨 정의 (read-only).
 *
 * JSON 형식:
 *   [{ "name": "MainMenu", "segments": ["menu", "menu-lighting"], "activeIndex": 0 }]
 *   또는 { "levels": [...] }
 */

import { readFile } from 'node:fs/promises';
import { ConfigurationError, toError } from '../errors/LevelErrors';

export interface LevelDefinition {
    name: string;

    /** load 순서 */
    segments: readonly string[];

    /** foreground segment index, -1이면 없음 */
    activeIndex: number;
}

function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function parseLevelDefinition(raw: unknown, path: string): LevelDefinition {
    if (!isRecord(raw)) {
        throw new ConfigurationError(`${path}: level definition must be an object`);
    }

    const { name, segments, activeIndex } = raw;

    if (typeof name !== 'string' || name.trim().length === 0) {
        throw new ConfigurationError(`${path}.name: must be a non-empty string`);
    }

    if (!Array.isArray(segments) || segments.length === 0) {
        throw new ConfigurationError(`${path}.segments: must be a non-empty array`, name);
    }

    const segmentIds: string[] = [];
    segments.forEach((segment: unknown, i) => {
        if (typeof segment !== 'string' || segment.length === 0) {
            throw new ConfigurationError(`${path}.segments[${i}]: must be a non-empty string`, name);
        }
        if (segmentIds.includes(segment)) {
            throw new ConfigurationError(`${path}.segments[${i}]: duplicate segment '${segment}'`, name);
        }
        segmentIds.push(segment);
    });

    let index = -1;
    if (activeIndex !== undefined) {
        if (typeof activeIndex !== 'number' || !Number.isInteger(activeIndex) || activeIndex < -1) {
            throw new ConfigurationError(`${path}.activeIndex: must be an integer >= -1`, name);
        }
        index = activeIndex;
    }

    return { name, segments: segmentIds, activeIndex: index };
}

/**
 * 검증 후 LevelDefinition 목록 반환
 * @throws ConfigurationError
 */
export function parseLevelDefinitions(raw: unknown): LevelDefinition[] {
    const list = isRecord(raw) ? raw.levels : raw;
    if (!Array.isArray(list)) {
        throw new ConfigurationError('Level definitions must be an array or { "levels": [...] }');
    }

    const definitions = list.map((entry: unknown, i) => parseLevelDefinition(entry, `levels[${i}]`));

    const seen = new Set<string>();
    for (const definition of definitions) {
        if (seen.has(definition.name)) {
            throw new ConfigurationError(`Duplicate level name '${definition.name}'`, definition.name);
        }
        seen.add(definition.name);
    }

    return definitions;
}

/**
 * JSON 파일에서 레벨 정의 로드
 * @throws ConfigurationError
 */
export async function loadLevelDefinitions(filePath: string): Promise<LevelDefinition[]> {
    let raw: unknown;
    try {
        raw = JSON.parse(await readFile(filePath, 'utf-8'));
    } catch (err) {
        throw new ConfigurationError(`Cannot read level definitions from ${filePath}: ${toError(err).message}`);
    }
    return parseLevelDefinitions(raw);
}
