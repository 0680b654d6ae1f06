/**
 * BootSequence - 프로세스 시작 시 한 번 실행.
 *
 * 흐름: bootstrap segment 확보 → persistent node 등록 → 첫 레벨 load + activate
 *
 * persistent node(카메라 rig 등)는 보통 bootstrap segment 안에 있다.
 * 등록된 node는 segment container에서 빠져나오므로, bootstrap segment는
 * 첫 레벨이 쓰지 않으면 activateAndUnloadOthers에서 내려가고 node만 남는다.
 */

import { createRequestResult, type LevelRequestResult } from '../core/levels/protocol/TransitionResult';
import { TaggedLogger } from '../shared/logging/TaggedLogger';
import type { LevelRuntime } from './createLevelRuntime';

export interface BootOptions {
    initialLevel: string;

    /** persistent container로 옮길 node 이름 */
    persistentNodeNames?: readonly string[];
}

export async function runBootSequence(runtime: LevelRuntime, options: BootOptions): Promise<LevelRequestResult> {
    const { loader, scene, orchestrator, config } = runtime;
    const bootstrap = config.bootstrapSegment;
    const log = new TaggedLogger('BootSequence', { verbose: config.verbose });

    if (loader.hasSource(bootstrap) && !loader.isPresent(bootstrap)) {
        const handle = loader.beginLoad(bootstrap, true);
        await handle.whenDone();
        if (handle.error) {
            return createRequestResult('loadLevel', options.initialLevel, 'failed', handle.error);
        }
    }

    for (const name of options.persistentNodeNames ?? []) {
        const node = scene.getNodeByName(name);
        if (!node) {
            log.warn(`Persistent node '${name}' not found in scene`);
            continue;
        }
        loader.adopt(node);
    }

    log.info(`Booting into '${options.initialLevel}'`);
    return orchestrator.loadLevel(options.initialLevel, true);
}
