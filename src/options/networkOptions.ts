import { z } from "zod";

import { AttributeBagSchema } from "../graph/attributes.js";
import type { AttributeBag } from "../graph/types.js";
import {
  createPhysicsOptions,
  selectSolver,
  type PhysicsOptions,
  type PhysicsSolver,
  type SolverParameters,
} from "./physics.js";

/** Edge smoothing modes understood by `vis-network`. */
export const EDGE_SMOOTH_TYPES = [
  "dynamic",
  "continuous",
  "discrete",
  "diagonalCross",
  "straightCross",
  "horizontal",
  "vertical",
  "curvedCW",
  "curvedCCW",
  "cubicBezier",
] as const;

export type EdgeSmoothType = (typeof EDGE_SMOOTH_TYPES)[number];

/** Panels of the interactive options UI. */
export const CONFIGURE_PANELS = [
  "nodes",
  "edges",
  "layout",
  "interaction",
  "manipulation",
  "physics",
  "selection",
  "renderer",
] as const;

export type ConfigurePanel = (typeof CONFIGURE_PANELS)[number];

export interface InteractionOptions {
  hideEdgesOnDrag: boolean;
  hideNodesOnDrag: boolean;
  dragNodes: boolean;
}

export interface ConfigureOptions {
  enabled: boolean;
  filter?: ConfigurePanel[] | true;
}

export interface EdgeOptions {
  smooth: { enabled: boolean; type: EdgeSmoothType };
  color: { inherit: boolean };
}

export type HierarchicalDirection = "UD" | "DU" | "LR" | "RL";

export interface LayoutOptions {
  hierarchical: {
    enabled: boolean;
    direction: HierarchicalDirection;
    sortMethod: "hubsize" | "directed";
  };
}

/** Typed view of the options object handed to `vis-network`. */
export interface VisOptions {
  interaction: InteractionOptions;
  configure: ConfigureOptions;
  physics: PhysicsOptions;
  edges: EdgeOptions;
  layout?: LayoutOptions;
}

const ConfigurePanelSchema = z.enum(CONFIGURE_PANELS);

/** Schema used to validate raw option overrides. */
export const OptionsOverrideSchema = AttributeBagSchema;

export class InvalidOptionsError extends Error {
  public readonly code = "E-OPTIONS-INVALID";
  public readonly details: { issues: string[] };

  constructor(issues: string[]) {
    super(`invalid network options: ${issues.join("; ")}`);
    this.name = "InvalidOptionsError";
    this.details = { issues };
  }
}

function createDefaultOptions(): VisOptions {
  return {
    interaction: { hideEdgesOnDrag: false, hideNodesOnDrag: false, dragNodes: true },
    configure: { enabled: false },
    physics: createPhysicsOptions(),
    edges: {
      smooth: { enabled: false, type: "continuous" },
      color: { inherit: true },
    },
  };
}

/**
 * Mutable builder for the `vis-network` options object. Toggles update the
 * typed state; {@link setOptions} swaps the whole object for a caller-provided
 * one, after which {@link toJSON} returns that object verbatim until
 * {@link resetOptions} is called.
 */
export class NetworkOptions {
  private state: VisOptions = createDefaultOptions();
  private custom: AttributeBag | null = null;

  get physics(): Readonly<PhysicsOptions> {
    return this.state.physics;
  }

  get interaction(): Readonly<InteractionOptions> {
    return this.state.interaction;
  }

  get configure(): Readonly<ConfigureOptions> {
    return this.state.configure;
  }

  get edges(): Readonly<EdgeOptions> {
    return this.state.edges;
  }

  get layout(): Readonly<LayoutOptions> | undefined {
    return this.state.layout;
  }

  /** Whether a raw options object replaced the typed state. */
  get isCustom(): boolean {
    return this.custom !== null;
  }

  useSolver<S extends PhysicsSolver>(solver: S, overrides: Partial<SolverParameters[S]> = {}): this {
    this.state.physics = selectSolver(this.state.physics, solver, overrides);
    return this;
  }

  togglePhysics(enabled: boolean): this {
    this.state.physics.enabled = enabled;
    return this;
  }

  toggleStabilization(enabled: boolean): this {
    this.state.physics.stabilization.enabled = enabled;
    return this;
  }

  toggleDragNodes(enabled: boolean): this {
    this.state.interaction.dragNodes = enabled;
    return this;
  }

  toggleHideEdgesOnDrag(enabled: boolean): this {
    this.state.interaction.hideEdgesOnDrag = enabled;
    return this;
  }

  toggleHideNodesOnDrag(enabled: boolean): this {
    this.state.interaction.hideNodesOnDrag = enabled;
    return this;
  }

  /** Edges take the colour of the node they come from. */
  inheritEdgeColors(enabled: boolean): this {
    this.state.edges.color.inherit = enabled;
    return this;
  }

  setEdgeSmooth(type: EdgeSmoothType): this {
    this.state.edges.smooth = { enabled: true, type };
    return this;
  }

  /**
   * Enables the interactive options UI. Passing a list restricts it to the
   * named panels; `true` or no argument shows every panel.
   */
  showButtons(filter?: readonly string[] | true): this {
    if (filter === undefined || filter === true) {
      this.state.configure = filter === true ? { enabled: true, filter: true } : { enabled: true };
      return this;
    }
    const panels = filter.map((panel) => {
      const parsed = ConfigurePanelSchema.safeParse(panel);
      if (!parsed.success) {
        throw new InvalidOptionsError([`unknown configure panel '${panel}'`]);
      }
      return parsed.data;
    });
    this.state.configure = { enabled: true, filter: panels };
    return this;
  }

  /** Selects the hierarchical layout, or the default one when {@link enabled} is false. */
  setHierarchicalLayout(enabled: boolean, direction: HierarchicalDirection = "UD"): this {
    if (!enabled) {
      delete this.state.layout;
      return this;
    }
    this.state.layout = { hierarchical: { enabled: true, direction, sortMethod: "hubsize" } };
    return this;
  }

  /**
   * Replaces the options object wholesale. Accepts the JSON text exported from
   * the options UI or an equivalent object.
   */
  setOptions(options: string | Record<string, unknown>): this {
    let raw: unknown = options;
    if (typeof options === "string") {
      try {
        raw = JSON.parse(options);
      } catch (error) {
        throw new InvalidOptionsError([error instanceof Error ? error.message : String(error)]);
      }
    }
    const parsed = OptionsOverrideSchema.safeParse(raw);
    if (!parsed.success) {
      throw new InvalidOptionsError(
        parsed.error.issues.map((issue) => `${issue.path.join(".") || "<root>"}: ${issue.message}`),
      );
    }
    this.custom = parsed.data;
    return this;
  }

  /** Drops a custom options object and returns to the defaults. */
  resetOptions(): this {
    this.custom = null;
    this.state = createDefaultOptions();
    return this;
  }

  /** Plain options object, detached from the builder. */
  toJSON(): Record<string, unknown> {
    if (this.custom) {
      return structuredClone(this.custom);
    }
    return { ...structuredClone(this.state) };
  }
}
