/**
 * Physics module — public API.
 *
 * Barrel export for the stone physics library.  Everything in this
 * directory is UI-independent.
 */

export type { Vec2 } from './vec2.ts'
export { ZERO, add, sub, cross, length, isFiniteVec } from './vec2.ts'
export type { Bounds } from './polygon.ts'
export { signedArea, polygonArea, polygonCentroid, vertexMean, polygonSecondMoment, polygonBounds, lowestY, pointInPolygon, segmentsIntersect, isSimplePolygon } from './polygon.ts'
export { InvalidBlueprintError, InvalidEnvironmentError, NonFiniteStateError } from './errors.ts'
export type { StoneSpec, Blueprint } from './blueprint.ts'
export { DEFAULT_CLOUD_POINTS, validateOutline, validateBlueprint, generatePointCloud, buildBlueprint } from './blueprint.ts'
export type { StonePresetKey } from './stone-presets.ts'
export { DENSITY_STONE, ellipseOutline, roundedSlabOutline, STONE_SPECS, isStonePresetKey, presetBlueprint } from './stone-presets.ts'
export type { EnvironmentParameters } from './environment.ts'
export { DEFAULT_ENVIRONMENT, validateEnvironment, createEnvironment } from './environment.ts'
export type { SubmergedGeometry } from './clipper.ts'
export { emptyGeometry, outlineToWorld, clipBelowWaterLine, computeSubmergedGeometry, clipWorldOutline } from './clipper.ts'
export type { AddedMass } from './added-mass.ts'
export { NO_ADDED_MASS, displacedMass, displacedInertia, computeAddedMass, effectiveMass, effectiveInertia } from './added-mass.ts'
export type { HydroLoads, HydroOptions } from './hydro-forces.ts'
export { dynamicPressureArea, contactVelocity, liftForce, dragForce, verticalDampingForce, suctionForce, pitchDampingTorque, computeHydroLoads } from './hydro-forces.ts'
export type { Phase, PhaseTracker, PhaseObservation } from './phase.ts'
export { PHASES, initialPhaseTracker, classifyContact, updatePhase, isLegalTransition } from './phase.ts'
export type { KinematicState, StateDerivative, DerivativeFunction, DynamicsContext, DynamicsEvaluation, SimulationState, Stamp, PhaseEvent } from './sim-state.ts'
export type { LaunchParameters, TickResult, SimulateOptions, StopReason, SimulationResult } from './sim.ts'
export {
  SIMULATION_DT, DEFAULT_FLOOR_DEPTH, DEFAULT_MAX_TIME,
  evaluateDynamics, computeDerivatives, dynamicsFunction,
  forwardEuler, rk4Step, isFiniteState, assertFiniteState,
  launchState, initialSimulationState, mechanicalEnergy,
  advanceTick, hasSettled, simulate,
} from './sim.ts'
