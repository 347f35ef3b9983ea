import { describe, it, expect } from 'vitest';
import { TerrainInteractionSystem } from '@/engine/systems/terrain/TerrainInteractionSystem';
import { addUnit, makeCtx, makeState, openRows } from '../integration/helpers';

describe('TerrainInteractionSystem.onEnter', () => {
  it('forest costs one idle tick, open ground nothing', () => {
    const rows = openRows();
    rows[1] = '...f........';
    const state = makeState({ rows });
    const unit = addUnit(state, 'blue', 'infantry', 2, 1);
    const ctx = makeCtx(state);

    TerrainInteractionSystem.onEnter(ctx, unit, { x: 4, y: 1 });
    expect(unit.idleTicks).toBe(0);

    TerrainInteractionSystem.onEnter(ctx, unit, { x: 3, y: 1 });
    expect(unit.idleTicks).toBe(1);
  });
});

describe('TerrainInteractionSystem.canRaiseWall', () => {
  it('only on free open ground away from HQs and buildings', () => {
    const rows = openRows();
    rows[0] = 'f~#.........';
    const state = makeState({ rows, buildings: [{ id: 'tw', kind: 'watchtower', x: 6, y: 6 }] });
    addUnit(state, 'red', 'infantry', 5, 5);
    const ctx = makeCtx(state);

    expect(TerrainInteractionSystem.canRaiseWall(state, ctx, { x: 3, y: 0 })).toBe(true);
    expect(TerrainInteractionSystem.canRaiseWall(state, ctx, { x: 0, y: 0 })).toBe(false);
    expect(TerrainInteractionSystem.canRaiseWall(state, ctx, { x: 1, y: 0 })).toBe(false);
    expect(TerrainInteractionSystem.canRaiseWall(state, ctx, { x: 2, y: 0 })).toBe(false);
    expect(TerrainInteractionSystem.canRaiseWall(state, ctx, { x: 5, y: 5 })).toBe(false);
    expect(TerrainInteractionSystem.canRaiseWall(state, ctx, { x: 6, y: 6 })).toBe(false);
    expect(TerrainInteractionSystem.canRaiseWall(state, ctx, { x: 1, y: 4 })).toBe(false);
    expect(TerrainInteractionSystem.canRaiseWall(state, ctx, { x: 12, y: 0 })).toBe(false);
  });
});

describe('TerrainInteractionSystem.raiseWall', () => {
  it('returns null when every neighbour is unsuitable', () => {
    const state = makeState();
    // (2, 4) borders the blue HQ on one side
    const engineer = addUnit(state, 'blue', 'engineer', 2, 4);
    addUnit(state, 'blue', 'infantry', 3, 4);
    addUnit(state, 'blue', 'infantry', 2, 5);
    addUnit(state, 'blue', 'infantry', 2, 3);
    const ctx = makeCtx(state);

    expect(TerrainInteractionSystem.raiseWall(state, ctx, engineer)).toBeNull();
    expect(state.grid.terrain.flat().includes('wall')).toBe(false);
  });

  it('walls are seen by later lookups in the same tick', () => {
    const state = makeState();
    const engineer = addUnit(state, 'blue', 'engineer', 5, 4);
    addUnit(state, 'blue', 'infantry', 6, 4);
    addUnit(state, 'blue', 'infantry', 4, 4);
    addUnit(state, 'blue', 'infantry', 5, 3);
    const ctx = makeCtx(state);

    expect(TerrainInteractionSystem.raiseWall(state, ctx, engineer)).toEqual({ x: 5, y: 5 });
    expect(ctx.grid.getTerrain(5, 5).walkable).toBe(false);
  });
});
