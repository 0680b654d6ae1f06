/**
 * SegmentLoader - segment load/unload primitive를 감싸는 leaf 컴포넌트.
 *
 * Segment 상태:
 *   (없음) → fetching → staged → present → (없음)
 *
 * - fetch는 segment당 한 번. beginLoad마다 그 fetch를 따라가는 handle을 따로 돌려준다.
 * - holder(보통 레벨 이름)가 있는 segment는 마지막 holder가 놓을 때까지 unload/discard되지 않는다.
 * - staged segment는 어느 handle이든 finalize를 허가하면 scene에 추가된다.
 * - persistent container node를 품은 segment는 unload하지 않는다.
 */

import * as BABYLON from '@babylonjs/core';
import { TaggedLogger } from '../../../shared/logging/TaggedLogger';
import { ResourceFault, toError } from '../errors/LevelErrors';
import type { PersistentObjectGuard } from '../guard/PersistentObjectGuard';
import { FINALIZE_THRESHOLD, SegmentHandle } from './SegmentHandle';
import { collectContainerNodes, type SegmentSource, type SegmentSourceMap } from './SegmentSource';

type SegmentEntryStatus = 'fetching' | 'staged' | 'present';

interface SegmentEntry {
    readonly id: string;
    status: SegmentEntryStatus;
    container: BABYLON.AssetContainer | null;

    /** 실제 fetch/finalize를 수행하는 내부 handle. scene 추가 후 null */
    loadHandle: SegmentHandle | null;

    readonly holders: Set<string>;

    /** finalize/discard를 아직 결정하지 않은 handle 수 */
    undecided: number;
}

export interface SegmentPresenceChange {
    segmentId: string;
    present: boolean;
}

export interface SegmentLoaderOptions {
    sources?: SegmentSourceMap;
    log?: TaggedLogger;
}

export class SegmentLoader {
    /** segment가 scene에 추가/제거될 때 */
    readonly onSegmentPresenceChangedObservable = new BABYLON.Observable<SegmentPresenceChange>();

    /** foreground segment 변경 */
    readonly onForegroundChangedObservable = new BABYLON.Observable<string | null>();

    private readonly scene: BABYLON.Scene;
    private readonly guard: PersistentObjectGuard;
    private readonly log: TaggedLogger;
    private readonly sources = new Map<string, SegmentSource>();
    private readonly entries = new Map<string, SegmentEntry>();
    private foreground: string | null = null;
    private disposed = false;

    constructor(scene: BABYLON.Scene, guard: PersistentObjectGuard, options: SegmentLoaderOptions = {}) {
        this.scene = scene;
        this.guard = guard;
        this.log = options.log ?? new TaggedLogger('SegmentLoader');

        for (const [segmentId, source] of Object.entries(options.sources ?? {})) {
            this.sources.set(segmentId, source);
        }
    }

    getScene(): BABYLON.Scene {
        return this.scene;
    }

    registerSource(segmentId: string, source: SegmentSource): void {
        if (this.sources.has(segmentId)) {
            this.log.warn(`Source for '${segmentId}' replaced`);
        }
        this.sources.set(segmentId, source);
    }

    hasSource(segmentId: string): boolean {
        return this.sources.has(segmentId);
    }

    /** fetching, staged, present 중 하나 */
    isPresent(segmentId: string): boolean {
        return this.entries.has(segmentId);
    }

    /** scene에 추가되어 있음 */
    isLoaded(segmentId: string): boolean {
        return this.entries.get(segmentId)?.status === 'present';
    }

    getPresentSegments(): string[] {
        return Array.from(this.entries.keys());
    }

    getHolders(segmentId: string): string[] {
        return Array.from(this.entries.get(segmentId)?.holders ?? []);
    }

    /**
     * segment에 속한 (dispose되지 않은) 모든 node
     */
    getNodes(segmentId: string): BABYLON.Node[] {
        const container = this.entries.get(segmentId)?.container;
        if (!container) return [];
        return collectContainerNodes(container).filter((node) => !node.isDisposed());
    }

    /**
     * parent가 없는 node (segment의 root objects)
     */
    getRootNodes(segmentId: string): BABYLON.Node[] {
        return this.getNodes(segmentId).filter((node) => node.parent === null);
    }

    hostsPersistent(segmentId: string): boolean {
        return this.guard.hostsPersistent(this.getNodes(segmentId));
    }

    getForegroundSegment(): string | null {
        return this.foreground;
    }

    /**
     * scene에 추가된 segment만 foreground가 될 수 있다
     */
    setForegroundSegment(segmentId: string): boolean {
        if (!this.isLoaded(segmentId)) return false;
        if (this.foreground !== segmentId) {
            this.foreground = segmentId;
            this.onForegroundChangedObservable.notifyObservers(segmentId);
        }
        return true;
    }

    /**
     * @param holder 지정하면 release/beginUnload로 놓을 때까지 segment가 유지된다
     */
    beginLoad(segmentId: string, allowFinalization: boolean = false, holder?: string): SegmentHandle {
        const handle = new SegmentHandle(segmentId, 'load', allowFinalization);
        const existing = this.entries.get(segmentId);

        if (existing) {
            if (holder !== undefined) existing.holders.add(holder);
            if (existing.loadHandle === null) {
                this.log.info(`'${segmentId}' is already present, skipping load`);
                handle.complete();
            } else {
                this.log.info(`'${segmentId}' is already loading, following it`);
                void this.follow(existing, existing.loadHandle, handle, holder);
            }
            return handle;
        }

        const source = this.sources.get(segmentId);
        if (!source) {
            const fault = new ResourceFault(segmentId, 'load', new Error('no source registered'));
            this.log.error(fault.message);
            handle.fail(fault);
            return handle;
        }

        const loadHandle = new SegmentHandle(segmentId, 'load');
        const entry: SegmentEntry = {
            id: segmentId,
            status: 'fetching',
            container: null,
            loadHandle,
            holders: new Set(holder === undefined ? [] : [holder]),
            undecided: 0,
        };
        this.entries.set(segmentId, entry);
        void this.runLoad(entry, loadHandle, source);
        void this.follow(entry, loadHandle, handle, holder);
        return handle;
    }

    /**
     * holder를 놓는다. scene에 있는 segment는 그대로 남는다.
     */
    release(segmentId: string, holder: string): void {
        if (this.entries.get(segmentId)?.holders.delete(holder)) {
            this.log.info(`'${segmentId}' released by '${holder}'`);
        }
    }

    /**
     * @param holder 지정하면 먼저 그 holder를 놓는다. 다른 holder가 남아 있으면 unload하지 않는다.
     */
    beginUnload(segmentId: string, holder?: string): SegmentHandle {
        const handle = new SegmentHandle(segmentId, 'unload', true);
        const entry = this.entries.get(segmentId);

        if (!entry) {
            this.log.info(`'${segmentId}' is not present, skipping unload`);
            handle.complete();
            return handle;
        }

        if (holder !== undefined) entry.holders.delete(holder);
        if (entry.holders.size > 0) {
            this.log.info(`'${segmentId}' is still held by ${[...entry.holders].join(', ')}, skipping unload`);
            handle.complete();
            return handle;
        }

        if (this.hostsPersistent(segmentId)) {
            this.log.info(`'${segmentId}' hosts a persistent object, skipping unload`);
            handle.complete();
            return handle;
        }

        void this.runUnload(entry, handle);
        return handle;
    }

    /**
     * node를 persistent container로 옮긴다.
     * scene에 있는 segment container에서 node와 그 하위 node를 빼내므로 segment는 계속 unload될 수 있다.
     */
    adopt(node: BABYLON.Node): void {
        const moved = new Set<BABYLON.Node>([node, ...node.getDescendants(false)]);

        for (const entry of this.entries.values()) {
            const container = entry.container;
            if (entry.status !== 'present' || !container) continue;
            if (!collectContainerNodes(container).some((owned) => moved.has(owned))) continue;

            const materials = new Set<BABYLON.Material>();
            for (const owned of moved) {
                if (owned instanceof BABYLON.AbstractMesh && owned.material) {
                    materials.add(owned.material);
                }
            }

            container.transformNodes = container.transformNodes.filter((owned) => !moved.has(owned));
            container.meshes = container.meshes.filter((owned) => !moved.has(owned));
            container.lights = container.lights.filter((owned) => !moved.has(owned));
            container.cameras = container.cameras.filter((owned) => !moved.has(owned));
            container.materials = container.materials.filter((material) => !materials.has(material));
            this.log.info(`'${node.name}' detached from '${entry.id}'`);
        }

        this.guard.adopt(node);
    }

    private async runLoad(entry: SegmentEntry, handle: SegmentHandle, source: SegmentSource): Promise<void> {
        const startTime = performance.now();

        try {
            const container = await source(this.scene, (p01) => handle.reportProgress(p01 * FINALIZE_THRESHOLD));
            entry.container = container;
            entry.status = 'staged';
            handle.markReadyToFinalize();

            const proceed = await handle.waitForFinalization();
            if (!proceed || this.disposed) {
                this.disposeContainer(container, false);
                if (this.entries.get(entry.id) === entry) {
                    this.entries.delete(entry.id);
                }
                this.log.info(`'${entry.id}' discarded before activation`);
                handle.complete();
                return;
            }

            container.addAllToScene();
            entry.status = 'present';
            entry.loadHandle = null;
            this.log.info(`'${entry.id}' loaded in ${Math.round(performance.now() - startTime)}ms`);
            this.onSegmentPresenceChangedObservable.notifyObservers({ segmentId: entry.id, present: true });
            handle.complete();
        } catch (err) {
            if (this.entries.get(entry.id) === entry) {
                this.entries.delete(entry.id);
            }
            if (entry.container) {
                this.disposeContainer(entry.container, false);
            }
            const fault = new ResourceFault(entry.id, 'load', toError(err));
            this.log.error(fault.message);
            handle.fail(fault);
        }
    }

    /**
     * 호출자 handle이 내부 load handle을 따라가게 한다.
     * 호출자가 discard하면 holder를 놓고, 아무도 붙잡고 있지 않을 때만 fetch를 버린다.
     */
    private async follow(
        entry: SegmentEntry,
        loadHandle: SegmentHandle,
        handle: SegmentHandle,
        holder: string | undefined
    ): Promise<void> {
        const relay = loadHandle.onProgressObservable.add((progress) => handle.reportProgress(progress));
        handle.reportProgress(loadHandle.progress);

        // whenReady/whenDone/finalize gate는 reject되지 않는다
        entry.undecided++;
        await loadHandle.whenReady();
        if (!loadHandle.isDone) {
            handle.markReadyToFinalize();
        }
        const proceed =
            loadHandle.isDone ||
            (await Promise.race([handle.waitForFinalization(), loadHandle.whenDone().then(() => true)]));
        entry.undecided--;

        if (!proceed) {
            loadHandle.onProgressObservable.remove(relay);
            if (holder !== undefined) entry.holders.delete(holder);
            const unclaimed = entry.holders.size === 0 && entry.undecided === 0;
            if (unclaimed && !loadHandle.finalizationAllowed) {
                loadHandle.discard();
                await loadHandle.whenDone();
            }
            handle.complete();
            return;
        }

        if (!loadHandle.isDone) {
            loadHandle.allowFinalization();
            await loadHandle.whenDone();
        }
        loadHandle.onProgressObservable.remove(relay);

        if (loadHandle.error) {
            handle.fail(loadHandle.error);
            return;
        }
        if (loadHandle.isDiscarded) {
            handle.discard();
        }
        handle.complete();
    }

    private async runUnload(entry: SegmentEntry, handle: SegmentHandle): Promise<void> {
        try {
            if (entry.status !== 'present') {
                // 아직 scene에 추가되지 않음: 진행 중인 load를 버린다
                const loadHandle = entry.loadHandle;
                if (loadHandle) {
                    loadHandle.discard();
                    await loadHandle.whenDone();
                }
                // finalize가 이미 허가된 load는 끝까지 진행되므로 이어서 제거한다
                if (this.entries.get(entry.id) !== entry || !this.isLoaded(entry.id)) {
                    handle.complete();
                    return;
                }
            }

            // dispose에 실패하면 entry를 남겨 다시 unload할 수 있게 한다
            if (entry.container) {
                this.disposeContainer(entry.container, true);
            }

            this.entries.delete(entry.id);
            if (this.foreground === entry.id) {
                this.foreground = null;
                this.onForegroundChangedObservable.notifyObservers(null);
            }

            this.log.info(`'${entry.id}' unloaded`);
            this.onSegmentPresenceChangedObservable.notifyObservers({ segmentId: entry.id, present: false });
            handle.complete();
        } catch (err) {
            const fault = new ResourceFault(entry.id, 'unload', toError(err));
            this.log.error(fault.message);
            handle.fail(fault);
        }
    }

    /**
     * deactivate에서 이미 dispose된 node는 제외하고 container를 정리한다
     */
    private disposeContainer(container: BABYLON.AssetContainer, inScene: boolean): void {
        container.transformNodes = container.transformNodes.filter((node) => !node.isDisposed());
        container.meshes = container.meshes.filter((mesh) => !mesh.isDisposed());
        container.lights = container.lights.filter((light) => !light.isDisposed());
        container.cameras = container.cameras.filter((camera) => !camera.isDisposed());
        if (inScene) {
            container.removeAllFromScene();
        }
        container.dispose();
    }

    /**
     * 모든 segment를 즉시 정리 (runtime 종료용)
     */
    dispose(): void {
        this.disposed = true;
        for (const entry of this.entries.values()) {
            if (entry.status === 'present' && entry.container) {
                this.disposeContainer(entry.container, true);
            } else {
                // 진행 중인 load는 runLoad가 정리한다
                entry.loadHandle?.discard();
            }
        }
        this.entries.clear();
        this.onSegmentPresenceChangedObservable.clear();
        this.onForegroundChangedObservable.clear();
    }
}
