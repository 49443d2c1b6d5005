export { LatencyEstimator } from "./client/LatencyEstimator.js";
export {
  type MovementPacket,
  MovementPacketState,
  PLAYER_ACTION_IDS,
  type PlayerAction,
  toWireAngles,
  wrapDegrees,
} from "./client/movementPackets.js";
export {
  type Abilities,
  type InputSample,
  PlayerPredictor,
  type PlayerPredictorOptions,
  type PredictorDebugStats,
  type ServerPose,
  type TickOutput,
} from "./client/PlayerPredictor.js";
export { PredictionBuffer } from "./client/PredictionBuffer.js";
export {
  DEFAULT_THRESHOLDS,
  findFrame,
  type ReconcileOutcome,
  type ReconcileResult,
  type ReconcileThresholds,
  reconcile,
} from "./client/reconcile.js";
export { VisualOffset } from "./client/VisualOffset.js";
export * from "./config/constants.js";
export { type AnyCVar, BooleanCVar, CVar, type CVarDesc, NumberCVar, StringCVar } from "./console/CVar.js";
export { CVarRegistry } from "./console/CVarRegistry.js";
export { registerSimCVars, type SimCVars } from "./console/simCVars.js";
export { type FixedTickCallbacks, FixedTickLoop } from "./core/FixedTickLoop.js";
export { closeSimLog, initSimLog, simLog, simLogError } from "./core/simLog.js";
export { FlatStrategy } from "./generation/FlatStrategy.js";
export { HeightmapStrategy, type HeightmapOptions } from "./generation/HeightmapStrategy.js";
export { NoiseMap, type NoiseMapOptions } from "./generation/NoiseMap.js";
export { buildColumn, populate, type TerrainStrategy } from "./generation/TerrainStrategy.js";
export { add, distanceSq, length, lengthSq, lerp, scale, sub, type Vec3, vec3, ZERO } from "./math/vec3.js";
export { type AABB3D, playerAABB } from "./physics/AABB3D.js";
export {
  effectiveSprint,
  jumpVelocity,
  moveFlying,
  type ResolveResult,
  resolve,
  simulateTick,
} from "./physics/PlayerMovement.js";
export {
  type InputState,
  initialSimState,
  makeInput,
  neutralInput,
  type PlayerSimState,
  type PredictedFrame,
} from "./physics/types.js";
export { WorldCollision } from "./physics/WorldCollision.js";
export { BlockRegistry, BlockShape, getBlockRegistry } from "./world/BlockRegistry.js";
export { AIR, blockId, blockMeta, makeBlockState, STONE } from "./world/BlockState.js";
export { type ChunkSectionData, ChunkColumnStore, type ChunkUpdate } from "./world/ChunkColumnStore.js";
export { type BlockLookup, blockToChunk, chunkKey } from "./world/types.js";
