import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import * as BABYLON from '@babylonjs/core';
import { PersistentObjectGuard } from '@/core/levels/guard/PersistentObjectGuard';

describe('PersistentObjectGuard', () => {
    let engine: BABYLON.NullEngine;
    let scene: BABYLON.Scene;
    let guard: PersistentObjectGuard;

    beforeEach(() => {
        engine = new BABYLON.NullEngine();
        scene = new BABYLON.Scene(engine);
        guard = new PersistentObjectGuard(scene, 'PersistentContainer');
    });

    afterEach(() => {
        scene.dispose();
        engine.dispose();
    });

    it('creates its container as a scene node', () => {
        expect(guard.root.name).toBe('PersistentContainer');
        expect(scene.getTransformNodeByName('PersistentContainer')).toBe(guard.root);
    });

    it('adopts a node by parenting it to the container', () => {
        const rig = new BABYLON.TransformNode('rig', scene);

        guard.adopt(rig);

        expect(rig.parent).toBe(guard.root);
        expect(guard.contains(rig)).toBe(true);
        expect(guard.getPersistentNodes()).toEqual([rig]);
    });

    it('treats descendants of adopted nodes as persistent', () => {
        const rig = new BABYLON.TransformNode('rig', scene);
        const camera = new BABYLON.TransformNode('camera-mount', scene);
        camera.parent = rig;

        guard.adopt(rig);

        expect(guard.contains(camera)).toBe(true);
        expect(guard.hostsPersistent([camera])).toBe(true);
    });

    it('filters persistent nodes out of a teardown list', () => {
        const rig = new BABYLON.TransformNode('rig', scene);
        const prop = new BABYLON.TransformNode('prop', scene);
        guard.adopt(rig);

        expect(guard.filterDestroyable([rig, prop])).toEqual([prop]);
        expect(guard.hostsPersistent([prop])).toBe(false);
    });

    it('releases a node back to the scene root', () => {
        const rig = new BABYLON.TransformNode('rig', scene);
        guard.adopt(rig);

        guard.release(rig);

        expect(rig.parent).toBe(null);
        expect(guard.contains(rig)).toBe(false);
    });

    it('recognises its own container', () => {
        expect(guard.contains(guard.root)).toBe(true);
    });
});
