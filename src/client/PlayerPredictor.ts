import {
  DEFAULT_FLYING_SPEED,
  FLY_TOGGLE_WINDOW_TICKS,
  HARD_TELEPORT_DISTANCE,
  PREDICTION_CAPACITY,
  RECONCILE_EPSILON,
  SMOOTHING_DECAY,
  SPEED_EFFECT_PER_LEVEL,
  SPRINT_FORWARD_THRESHOLD,
} from "../config/constants.js";
import type { SimCVars } from "../console/simCVars.js";
import { simLog } from "../core/simLog.js";
import { add, length, lerp, sub, type Vec3, ZERO } from "../math/vec3.js";
import { effectiveSprint, simulateTick } from "../physics/PlayerMovement.js";
import { type InputState, initialSimState, type PlayerSimState } from "../physics/types.js";
import type { WorldCollision } from "../physics/WorldCollision.js";
import { LatencyEstimator } from "./LatencyEstimator.js";
import { type MovementPacket, MovementPacketState, type PlayerAction } from "./movementPackets.js";
import { PredictionBuffer } from "./PredictionBuffer.js";
import { findFrame, type ReconcileResult, type ReconcileThresholds, reconcile } from "./reconcile.js";
import { VisualOffset } from "./VisualOffset.js";

/** Raw per-tick input from the input layer, before abilities are stamped on. */
export type InputSample = Pick<InputState, "forward" | "strafe" | "jump" | "sprint" | "sneak" | "yaw" | "pitch">;

/** Authoritative pose decoded from a server position packet. */
export interface ServerPose {
  /** Local tick this pose corresponds to (client tick minus one-way latency). */
  tickEstimate: number;
  pos: Vec3;
  yaw: number;
  pitch: number;
  onGround: boolean;
}

export interface Abilities {
  /** 0 survival, 1 creative, 2 adventure, 3 spectator. */
  gamemode: number;
  canFly: boolean;
  flying: boolean;
  flyingSpeed: number;
  walkingSpeed: number;
  speedEffectAmplifier: number | null;
  jumpBoostAmplifier: number | null;
}

export interface TickOutput {
  tick: number;
  state: PlayerSimState;
  packet: MovementPacket;
  actions: PlayerAction[];
  /** Flight was toggled locally; the host should report abilities upstream. */
  abilitiesChanged: boolean;
}

export interface PredictorDebugStats {
  clientTick: number;
  historyLatestTick: number | null;
  historyCapacity: number;
  oneWayTicks: number;
  lastCorrection: number;
  lastReplay: number;
  softCorrections: number;
  hardTeleports: number;
  smoothingOffset: number;
  onGround: boolean;
  flying: boolean;
}

export interface PlayerPredictorOptions {
  cvars?: SimCVars;
  /** Millisecond clock for latency measurement. */
  now?: () => number;
}

const DEFAULT_ABILITIES: Abilities = {
  gamemode: 0,
  canFly: false,
  flying: false,
  flyingSpeed: DEFAULT_FLYING_SPEED,
  walkingSpeed: 0.1,
  speedEffectAmplifier: null,
  jumpBoostAmplifier: null,
};

function gamemodeAllowsFlight(gamemode: number): boolean {
  return gamemode === 1 || gamemode === 3;
}

/**
 * Client-side prediction for the local player.
 *
 * Owns the simulated state, the prediction history, and the render-only
 * correction offset. The host calls {@link tick} once per fixed step and
 * drains server events ({@link applyServerPose}, {@link applyServerVelocity})
 * between ticks, never during one.
 */
export class PlayerPredictor {
  private _state: PlayerSimState = initialSimState();
  /** State before the last tick, for render interpolation. */
  private previous: PlayerSimState = initialSimState();
  private buffer: PredictionBuffer;
  private readonly visual = new VisualOffset();
  private readonly packets = new MovementPacketState();
  private readonly latency = new LatencyEstimator();
  private _abilities: Abilities = { ...DEFAULT_ABILITIES };
  private _clientTick = 0;

  private sneaking = false;
  private sprinting = false;
  private jumpWasPressed = false;
  private flyToggleTimer = 0;

  private lastCorrection = 0;
  private lastReplay = 0;
  private softCorrections = 0;
  private hardTeleports = 0;

  private readonly cvars: SimCVars | undefined;
  private readonly now: () => number;

  constructor(options: PlayerPredictorOptions = {}) {
    this.cvars = options.cvars;
    this.now = options.now ?? (() => performance.now());
    this.buffer = new PredictionBuffer(this.capacity());
  }

  get state(): PlayerSimState {
    return this._state;
  }

  get clientTick(): number {
    return this._clientTick;
  }

  get abilities(): Readonly<Abilities> {
    return this._abilities;
  }

  get visualOffset(): Vec3 {
    return this.visual.offset;
  }

  /** Tick the server most likely reached, for stamping incoming poses. */
  estimateServerTick(): number {
    return this.latency.tickEstimate(Math.max(0, this._clientTick - 1));
  }

  /**
   * Start a fresh session (connect, respawn, disconnect). History, offset
   * and packet baselines never survive this boundary.
   */
  reset(state: PlayerSimState = initialSimState()): void {
    this._state = state;
    this.previous = state;
    const capacity = this.capacity();
    if (capacity !== this.buffer.capacity) {
      this.buffer = new PredictionBuffer(capacity);
    } else {
      this.buffer.clear();
    }
    this.visual.clear();
    this.packets.reset();
    this.latency.reset();
    this._clientTick = 0;
    this.sneaking = false;
    this.sprinting = false;
    this.jumpWasPressed = false;
    this.flyToggleTimer = 0;
    this.lastCorrection = 0;
    this.lastReplay = 0;
  }

  /** Apply an abilities update. Flight is only kept in creative and spectator. */
  setAbilities(update: Partial<Abilities>): void {
    const next = { ...this._abilities, ...update };
    if (!gamemodeAllowsFlight(next.gamemode)) {
      next.canFly = false;
      next.flying = false;
      this.flyToggleTimer = 0;
    }
    this._abilities = next;
  }

  /**
   * One fixed step: sample → simulate → record → emit.
   */
  tick(sample: InputSample, world: WorldCollision): TickOutput {
    const abilitiesChanged = this.updateFlight(sample.jump);
    const input = this.stampInput(sample);

    this.previous = this._state;
    const next = this.cvars?.cl_nopredict.get()
      ? { ...this._state, yaw: input.yaw, pitch: input.pitch }
      : simulateTick(this._state, input, world);

    const tick = this._clientTick;
    this.buffer.push({ tick, input, state: next });
    this._state = next;

    let flightChanged = abilitiesChanged;
    if (this._abilities.flying && this._abilities.gamemode !== 3 && next.onGround) {
      this._abilities = { ...this._abilities, flying: false };
      flightChanged = true;
    }
    this._clientTick++;

    const emitted = this.emit(input);
    this.latency.onSent(this.now());
    return { tick, state: next, ...emitted, abilitiesChanged: flightChanged };
  }

  /**
   * Merge an authoritative pose. Without usable history the predictor snaps
   * straight to the server; that snap is reported as a hard teleport.
   * Queues an acknowledgement for the next emitted packet either way.
   */
  applyServerPose(pose: ServerPose, world: WorldCollision): ReconcileResult | null {
    this.latency.onReceived(this.now());
    const server: PlayerSimState = {
      pos: pose.pos,
      vel: ZERO,
      onGround: pose.onGround,
      yaw: pose.yaw,
      pitch: pose.pitch,
    };
    this.packets.acknowledge(server);

    const lastTick = this.buffer.latestTick;
    let result: ReconcileResult | null;
    const missing =
      lastTick === null || (pose.tickEstimate <= lastTick && !findFrame(this.buffer, pose.tickEstimate));
    if (this.cvars?.cl_nopredict.get() || missing) {
      result = this.snapTo(server);
    } else {
      const outcome = reconcile(this.buffer, world, pose.tickEstimate, server, lastTick, this._state, this.thresholds());
      this._state = outcome.state;
      result = outcome.result;
      if (result?.hardTeleport) {
        this.previous = outcome.state;
        this.visual.clear();
      } else if (result) {
        this.previous = { ...this.previous, pos: add(this.previous.pos, result.correction) };
        this.visual.apply(result);
      }
    }

    if (result) this.record(result, pose.tickEstimate);
    return result;
  }

  /** Server velocity event: replaces the current velocity outright. */
  applyServerVelocity(vel: Vec3): void {
    this._state = { ...this._state, vel };
  }

  decayVisualOffset(dtSeconds: number): void {
    this.visual.decay(dtSeconds, this.cvars?.cl_smoothing_decay.get() ?? SMOOTHING_DECAY);
  }

  /** Interpolated feet position plus the correction offset. */
  renderPosition(alpha: number): Vec3 {
    return add(lerp(this.previous.pos, this._state.pos, alpha), this.visual.offset);
  }

  debugStats(): PredictorDebugStats {
    return {
      clientTick: this._clientTick,
      historyLatestTick: this.buffer.latestTick,
      historyCapacity: this.buffer.capacity,
      oneWayTicks: this.latency.oneWayTicks,
      lastCorrection: this.lastCorrection,
      lastReplay: this.lastReplay,
      softCorrections: this.softCorrections,
      hardTeleports: this.hardTeleports,
      smoothingOffset: this.visual.length,
      onGround: this._state.onGround,
      flying: this._abilities.flying,
    };
  }

  /** Double-tap jump toggles flight within the window. Returns true on a toggle. */
  private updateFlight(jump: boolean): boolean {
    const jumpPressed = jump && !this.jumpWasPressed;
    this.jumpWasPressed = jump;
    if (this.flyToggleTimer > 0) this.flyToggleTimer--;

    if (this._abilities.canFly) {
      if (!jumpPressed) return false;
      if (this.flyToggleTimer === 0) {
        this.flyToggleTimer = FLY_TOGGLE_WINDOW_TICKS;
        return false;
      }
      this._abilities = { ...this._abilities, flying: !this._abilities.flying };
      this.flyToggleTimer = 0;
      return true;
    }
    if (this._abilities.flying) {
      this._abilities = { ...this._abilities, flying: false };
      this.flyToggleTimer = 0;
      return true;
    }
    return false;
  }

  /**
   * Stamp abilities and effects onto the sample and latch sprinting: starting
   * needs strong forward input and some movement, keeping it only forward.
   */
  private stampInput(sample: InputSample): InputState {
    const { vel } = this._state;
    const canStart =
      sample.sprint &&
      !sample.sneak &&
      sample.forward >= SPRINT_FORWARD_THRESHOLD &&
      vel.x * vel.x + vel.z * vel.z > 1.0e-5;
    const canKeep = this.sprinting && sample.sprint && !sample.sneak && sample.forward > 0;
    const speedAmp = this._abilities.speedEffectAmplifier;

    return {
      ...sample,
      sprint: canStart || canKeep,
      canFly: this._abilities.canFly,
      flying: this._abilities.flying,
      flyingSpeed: this._abilities.flyingSpeed,
      speedMultiplier: speedAmp === null ? 1 : 1 + SPEED_EFFECT_PER_LEVEL * (speedAmp + 1),
      jumpBoostAmplifier: this._abilities.jumpBoostAmplifier,
    };
  }

  private emit(input: InputState): { packet: MovementPacket; actions: PlayerAction[] } {
    const ack = this.packets.takeAck();
    if (ack) return { packet: ack, actions: [] };

    const actions: PlayerAction[] = [];
    if (input.sneak !== this.sneaking) {
      actions.push(input.sneak ? "start_sneaking" : "stop_sneaking");
      this.sneaking = input.sneak;
    }
    const sprint = effectiveSprint(input);
    if (sprint !== this.sprinting) {
      actions.push(sprint ? "start_sprinting" : "stop_sprinting");
      this.sprinting = sprint;
    }
    return { packet: this.packets.next(this._state), actions };
  }

  private snapTo(server: PlayerSimState): ReconcileResult {
    const correction = sub(server.pos, this._state.pos);
    this._state = server;
    this.previous = server;
    this.buffer.clear();
    this.visual.clear();
    return { correction, replayedTicks: 0, hardTeleport: true };
  }

  private record(result: ReconcileResult, serverTick: number): void {
    const len = length(result.correction);
    this.lastCorrection = len;
    this.lastReplay = result.replayedTicks;
    if (result.hardTeleport) this.hardTeleports++;
    else this.softCorrections++;

    if (this.cvars?.cl_log_reconcile.get() && len >= this.cvars.cl_reconcile_log_threshold.get()) {
      simLog(
        `reconcile tick=${serverTick} err=${len.toFixed(4)} replayed=${result.replayedTicks}` +
          `${result.hardTeleport ? " hard" : ""}`,
      );
    }
  }

  private capacity(): number {
    return Math.floor(this.cvars?.cl_prediction_capacity.get() ?? PREDICTION_CAPACITY);
  }

  private thresholds(): ReconcileThresholds {
    return {
      epsilon: this.cvars?.cl_reconcile_epsilon.get() ?? RECONCILE_EPSILON,
      hardTeleportDistance: this.cvars?.cl_hard_teleport_distance.get() ?? HARD_TELEPORT_DISTANCE,
    };
  }
}
