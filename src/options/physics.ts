/**
 * Physics section of the `vis-network` options object. The solver parameters
 * mirror the names used by the browser library so the object can be embedded
 * verbatim.
 */

export type PhysicsSolver = "barnesHut" | "repulsion" | "hierarchicalRepulsion" | "forceAtlas2Based";

export const PHYSICS_SOLVERS: readonly PhysicsSolver[] = [
  "barnesHut",
  "repulsion",
  "hierarchicalRepulsion",
  "forceAtlas2Based",
];

export interface BarnesHutParameters {
  gravitationalConstant: number;
  centralGravity: number;
  springLength: number;
  springConstant: number;
  damping: number;
  avoidOverlap: number;
}

export interface RepulsionParameters {
  nodeDistance: number;
  centralGravity: number;
  springLength: number;
  springConstant: number;
  damping: number;
}

export type HierarchicalRepulsionParameters = RepulsionParameters;

export type ForceAtlas2BasedParameters = BarnesHutParameters;

/** Parameters accepted by each solver, keyed by solver name. */
export interface SolverParameters {
  barnesHut: BarnesHutParameters;
  repulsion: RepulsionParameters;
  hierarchicalRepulsion: HierarchicalRepulsionParameters;
  forceAtlas2Based: ForceAtlas2BasedParameters;
}

export interface StabilizationOptions {
  enabled: boolean;
  iterations: number;
  updateInterval: number;
  onlyDynamicEdges: boolean;
  fit: boolean;
}

export interface PhysicsOptions extends Partial<SolverParameters> {
  enabled: boolean;
  stabilization: StabilizationOptions;
  solver?: PhysicsSolver;
}

export const SOLVER_DEFAULTS: SolverParameters = Object.freeze({
  barnesHut: {
    gravitationalConstant: -80000,
    centralGravity: 0.3,
    springLength: 250,
    springConstant: 0.001,
    damping: 0.09,
    avoidOverlap: 0,
  },
  repulsion: {
    nodeDistance: 100,
    centralGravity: 0.2,
    springLength: 200,
    springConstant: 0.05,
    damping: 0.09,
  },
  hierarchicalRepulsion: {
    nodeDistance: 120,
    centralGravity: 0.0,
    springLength: 100,
    springConstant: 0.01,
    damping: 0.09,
  },
  forceAtlas2Based: {
    gravitationalConstant: -50,
    centralGravity: 0.01,
    springLength: 100,
    springConstant: 0.08,
    damping: 0.4,
    avoidOverlap: 0,
  },
});

export function createPhysicsOptions(): PhysicsOptions {
  return {
    enabled: true,
    stabilization: {
      enabled: true,
      iterations: 1000,
      updateInterval: 50,
      onlyDynamicEdges: false,
      fit: true,
    },
  };
}

/**
 * Returns a copy of {@link physics} running {@link solver}. Parameters left out
 * of {@link overrides} keep their defaults and any previously selected solver
 * block is dropped, so at most one solver is ever configured.
 */
export function selectSolver<S extends PhysicsSolver>(
  physics: PhysicsOptions,
  solver: S,
  overrides: Partial<SolverParameters[S]> = {},
): PhysicsOptions {
  const next: PhysicsOptions = {
    enabled: physics.enabled,
    stabilization: { ...physics.stabilization },
    solver,
  };
  const parameters: SolverParameters[S] = { ...SOLVER_DEFAULTS[solver], ...overrides };
  assignSolver(next, solver, parameters);
  return next;
}

function assignSolver<S extends PhysicsSolver>(
  target: Partial<SolverParameters>,
  solver: S,
  parameters: SolverParameters[S],
): void {
  target[solver] = parameters;
}
