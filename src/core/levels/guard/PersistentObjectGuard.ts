/**
 * PersistentObjectGuard - 레벨 teardown에서 살아남아야 하는 node 보호.
 *
 * orchestrator 소유의 persistent container(TransformNode) 아래에 있는 node는
 * - deactivate()의 node dispose 단계
 * - segment unload 단계
 * 모두에서 제외된다.
 *
 * 판정은 container 소속 여부로만 한다 (node 타입 무관).
 */

import * as BABYLON from '@babylonjs/core';
import { TaggedLogger } from '../../../shared/logging/TaggedLogger';

export class PersistentObjectGuard {
    readonly root: BABYLON.TransformNode;
    private readonly log: TaggedLogger;

    constructor(scene: BABYLON.Scene, containerName: string, log: TaggedLogger = new TaggedLogger('PersistentObjectGuard')) {
        // scene에 직접 붙는 root. 어떤 segment container에도 속하지 않는다.
        this.root = new BABYLON.TransformNode(containerName, scene);
        this.log = log;
    }

    /**
     * node를 persistent container로 옮긴다 (DontDestroy).
     */
    adopt(node: BABYLON.Node): void {
        if (this.contains(node)) return;
        node.parent = this.root;
        this.log.info(`Adopted '${node.name}'`);
    }

    /**
     * persistent container에서 꺼내 scene root로 되돌린다.
     */
    release(node: BABYLON.Node): void {
        if (node === this.root || node.parent !== this.root) return;
        node.parent = null;
        this.log.info(`Released '${node.name}'`);
    }

    contains(node: BABYLON.Node): boolean {
        return node === this.root || node.isDescendantOf(this.root);
    }

    /**
     * 주어진 node 중 하나라도 persistent container에 속하면 true
     */
    hostsPersistent(nodes: readonly BABYLON.Node[]): boolean {
        return nodes.some((node) => this.contains(node));
    }

    /**
     * dispose해도 되는 node만 남긴다
     */
    filterDestroyable<T extends BABYLON.Node>(nodes: readonly T[]): T[] {
        return nodes.filter((node) => !this.contains(node));
    }

    getPersistentNodes(): BABYLON.Node[] {
        return this.root.getChildren();
    }

    dispose(): void {
        this.root.dispose();
    }
}
