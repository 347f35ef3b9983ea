// ─────────────────────────────────────────────
//  Typed Event Bus
//  The simulation reports everything it does through events.
//  Each Simulation owns its own bus; with nothing attached, emit is a no-op.
// ─────────────────────────────────────────────

import type { FactionId, Winner } from '@/engine/data/types/Faction';
import type { RoleId } from '@/engine/data/types/Unit';
import type { Pos } from '@/engine/data/types/Map';
import type { WeatherKind } from '@/engine/data/types/Weather';
import type { BuildingKind } from '@/engine/data/types/Territory';
import type { LogClass } from './Logger';

/** Common payload of the telemetry events consumed by logging sinks */
export interface UnitEventBase {
  tick: number;
  unitId: string;
  faction: FactionId;
  role: RoleId;
  x: number;
  y: number;
}

export type DeathCause = 'combat' | 'attrition' | 'removed';

/** Centralised map of all simulation events and their payload types */
export interface SimEventMap {
  // Telemetry contract
  spawn:     UnitEventBase;
  move:      UnitEventBase & { from: Pos };
  attack:    UnitEventBase & { targetId: string; damage: number };
  attack_hq: UnitEventBase & { target: FactionId; damage: number; hqHp: number };
  death:     UnitEventBase & { cause: DeathCause; killerId: string | null };

  // Territory
  tileCaptured:     { tick: number; x: number; y: number; faction: FactionId };
  tileLost:         { tick: number; x: number; y: number; faction: FactionId };
  buildingCaptured: { tick: number; buildingId: string; kind: BuildingKind; faction: FactionId; previous: FactionId | null };

  // Units
  unitPromoted: { tick: number; unitId: string; faction: FactionId };
  wallPlaced:   { tick: number; unitId: string; x: number; y: number };

  // World
  weatherChanged: { tick: number; kind: WeatherKind };
  tickCompleted:  { tick: number };
  gameOver:       { tick: number; winner: Winner };

  // Log
  logMessage: { text: string; cls: LogClass };
}

type Listener<T> = (payload: T) => void;

export class TypedEventBus<TMap extends object> {
  private listeners: { [K in keyof TMap]?: Listener<TMap[K]>[] } = {};

  on<K extends keyof TMap>(event: K, listener: Listener<TMap[K]>): void {
    const arr = this.listeners[event] ?? [];
    arr.push(listener);
    this.listeners[event] = arr;
  }

  off<K extends keyof TMap>(event: K, listener: Listener<TMap[K]>): void {
    const arr = this.listeners[event];
    if (!arr) return;
    const idx = arr.indexOf(listener);
    if (idx !== -1) arr.splice(idx, 1);
  }

  emit<K extends keyof TMap>(event: K, payload: TMap[K]): void {
    const arr = this.listeners[event];
    if (!arr) return;
    // Iterate a copy so listeners can safely remove themselves
    [...arr].forEach(fn => fn(payload));
  }

  /** Remove all listeners */
  clear(): void {
    this.listeners = {};
  }
}

export type SimEventBus = TypedEventBus<SimEventMap>;

export function createEventBus(): SimEventBus {
  return new TypedEventBus<SimEventMap>();
}
