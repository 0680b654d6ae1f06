/**
 * SegmentSource - segment 하나의 콘텐츠를 AssetContainer로 만들어 주는 함수.
 *
 * 반환된 container는 아직 scene에 추가되지 않은 상태여야 한다.
 * scene 추가(addAllToScene)는 SegmentLoader가 finalize 시점에 수행한다.
 */

import * as BABYLON from '@babylonjs/core';

export type SegmentSource = (
    scene: BABYLON.Scene,
    onProgress: (progress01: number) => void
) => Promise<BABYLON.AssetContainer>;

export type SegmentSourceMap = Readonly<Record<string, SegmentSource>>;

/**
 * 코드로 콘텐츠를 생성하는 segment.
 *
 * build 안에서 만든 node는 scene에 바로 붙지 않도록
 * `new BABYLON.TransformNode(name, scene, false)`처럼 생성하고 container에 넣는다.
 */
export function createProceduralSegmentSource(
    build: (container: BABYLON.AssetContainer, scene: BABYLON.Scene) => void | Promise<void>
): SegmentSource {
    return async (scene, onProgress) => {
        const container = new BABYLON.AssetContainer(scene);
        onProgress(0);
        await build(container, scene);
        onProgress(1);
        return container;
    };
}

/**
 * container 안의 모든 node (mesh, transform node, light, camera)
 */
export function collectContainerNodes(container: BABYLON.AssetContainer): BABYLON.Node[] {
    return [
        ...container.transformNodes,
        ...container.meshes,
        ...container.lights,
        ...container.cameras,
    ];
}
