import {
  HARD_TELEPORT_DISTANCE,
  PREDICTION_CAPACITY,
  RECONCILE_EPSILON,
  SMOOTHING_DECAY,
} from "../config/constants.js";
import type { BooleanCVar, NumberCVar } from "./CVar.js";
import type { CVarRegistry } from "./CVarRegistry.js";

export interface SimCVars {
  cl_nopredict: BooleanCVar;
  cl_prediction_capacity: NumberCVar;
  cl_reconcile_epsilon: NumberCVar;
  cl_hard_teleport_distance: NumberCVar;
  cl_smoothing_decay: NumberCVar;
  cl_log_reconcile: BooleanCVar;
  cl_reconcile_log_threshold: NumberCVar;
}

export function registerSimCVars(registry: CVarRegistry): SimCVars {
  const cl_nopredict = registry.register({
    name: "cl_nopredict",
    description: "Disable local prediction (snap to server poses)",
    type: "boolean",
    defaultValue: false,
    category: "cl",
  });

  const cl_prediction_capacity = registry.register({
    name: "cl_prediction_capacity",
    description: "Predicted frames kept for replay (applied on reset)",
    type: "number",
    defaultValue: PREDICTION_CAPACITY,
    min: 8,
    max: 4096,
    category: "cl",
  });

  const cl_reconcile_epsilon = registry.register({
    name: "cl_reconcile_epsilon",
    description: "Position error ignored by reconciliation (blocks)",
    type: "number",
    defaultValue: RECONCILE_EPSILON,
    min: 0,
    max: 1,
    category: "cl",
  });

  const cl_hard_teleport_distance = registry.register({
    name: "cl_hard_teleport_distance",
    description: "Position error that snaps instead of replaying (blocks)",
    type: "number",
    defaultValue: HARD_TELEPORT_DISTANCE,
    min: 0.01,
    max: 64,
    category: "cl",
  });

  const cl_smoothing_decay = registry.register({
    name: "cl_smoothing_decay",
    description: "Visual correction decay per 50 ms",
    type: "number",
    defaultValue: SMOOTHING_DECAY,
    min: 0,
    max: 1,
    category: "cl",
  });

  const cl_log_reconcile = registry.register({
    name: "cl_log_reconcile",
    description: "Log reconciliation corrections",
    type: "boolean",
    defaultValue: false,
    category: "cl",
  });

  const cl_reconcile_log_threshold = registry.register({
    name: "cl_reconcile_log_threshold",
    description: "Minimum correction length to log (blocks)",
    type: "number",
    defaultValue: 0.05,
    min: 0,
    max: 64,
    category: "cl",
  });

  return {
    cl_nopredict,
    cl_prediction_capacity,
    cl_reconcile_epsilon,
    cl_hard_teleport_distance,
    cl_smoothing_decay,
    cl_log_reconcile,
    cl_reconcile_log_threshold,
  };
}
