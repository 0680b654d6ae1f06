import * as BABYLON from '@babylonjs/core';
import { SceneLoader } from '@babylonjs/core/Loading/sceneLoader';
import '@babylonjs/loaders/glTF';
import type { SegmentSource } from './SegmentSource';

export type ContainerLoadFunction = (
    rootUrl: string,
    filename: string,
    scene: BABYLON.Scene,
    onProgress: (event: BABYLON.ISceneLoaderProgressEvent) => void
) => Promise<BABYLON.AssetContainer>;

const loadWithSceneLoader: ContainerLoadFunction = (rootUrl, filename, scene, onProgress) =>
    SceneLoader.LoadAssetContainerAsync(rootUrl, filename, scene, onProgress);

export function splitSegmentUrl(url: string): { rootUrl: string; filename: string } {
    const idx = url.lastIndexOf('/');
    if (idx < 0) return { rootUrl: '', filename: url };
    return { rootUrl: url.slice(0, idx + 1), filename: url.slice(idx + 1) };
}

export function progressFromEvent(event: BABYLON.ISceneLoaderProgressEvent): number | null {
    if (!event.lengthComputable || event.total <= 0) return null;
    return Math.max(0, Math.min(1, event.loaded / event.total));
}

/**
 * glTF/GLB/.babylon 파일 하나를 segment로 사용한다.
 * AssetContainer로 백그라운드 로드하고, scene 추가는 finalize 시점으로 미룬다.
 */
export function createFileSegmentSource(
    url: string,
    load: ContainerLoadFunction = loadWithSceneLoader
): SegmentSource {
    const { rootUrl, filename } = splitSegmentUrl(url);

    return async (scene, onProgress) => {
        const container = await load(rootUrl, filename, scene, (event) => {
            const progress = progressFromEvent(event);
            if (progress !== null) onProgress(progress);
        });
        onProgress(1);
        return container;
    };
}
