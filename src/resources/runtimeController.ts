import { defineResource } from "braided";
import {
  emergentSystem,
  type EventHandlerMap,
  type EffectExecutorMap,
} from "emergent";
import { produce } from "immer";
import { ConfigurationError } from "../flock/errors";
import {
  commandKeywords,
  effectKeywords,
  eventKeywords,
} from "../flock/vocabulary/keywords";
import { resolveSimulationConfig } from "../flock/vocabulary/schemas/config";
import type {
  SimulationConfig,
  SimulationConfigPatch,
} from "../flock/vocabulary/schemas/config";
import type { ControlEffect } from "../flock/vocabulary/schemas/effects";
import { allEventSchema } from "../flock/vocabulary/schemas/events";
import type { AllEvents } from "../flock/vocabulary/schemas/events";
import type { RuntimeStore } from "../flock/vocabulary/schemas/state";
import { getPreset } from "../profiles";
import type { ConfigResource, RuntimeStoreApi } from "./config";
import type { EngineResource } from "./engine";

export const SPEED_STEP = 0.1;
export const MIN_SPEED_MULTIPLIER = 0.1;
export const MAX_SPEED_MULTIPLIER = 10;

/**
 * Speed after one +/- step, kept within [0.1, 10] and rounded to one
 * decimal so repeated steps do not drift
 */
export function stepSpeedMultiplier(
  current: number,
  direction: "up" | "down"
): number {
  const delta = direction === "up" ? SPEED_STEP : -SPEED_STEP;
  const next = Math.round((current + delta) * 10) / 10;
  return Math.min(MAX_SPEED_MULTIPLIER, Math.max(MIN_SPEED_MULTIPLIER, next));
}

// ============================================
// Event Handlers (Pure Functions)
// ============================================

type HandlerContext = {
  nextState: (
    current: RuntimeStore,
    mutation: (draft: RuntimeStore) => void
  ) => RuntimeStore;
};

const handlers = {
  [eventKeywords.controls.paused]: (): ControlEffect[] => [
    {
      type: effectKeywords.engine.stage,
      command: { type: commandKeywords.pause },
    },
  ],

  [eventKeywords.controls.resumed]: (): ControlEffect[] => [
    {
      type: effectKeywords.engine.stage,
      command: { type: commandKeywords.resume },
    },
  ],

  [eventKeywords.controls.speedMultiplierChanged]: (
    state: RuntimeStore,
    event,
    ctx
  ): ControlEffect[] => {
    return [
      {
        type: effectKeywords.engine.stage,
        command: {
          type: commandKeywords.setSpeedMultiplier,
          value: event.value,
        },
      },
      {
        type: effectKeywords.config.update,
        state: ctx.nextState(state, (draft) => {
          draft.config.speedMultiplier = event.value;
        }),
      },
    ];
  },

  [eventKeywords.controls.speedStepped]: (
    state: RuntimeStore,
    event,
    ctx
  ): ControlEffect[] => {
    const current = state.config.speedMultiplier;
    const value = stepSpeedMultiplier(current, event.direction);
    if (value === current) {
      return [
        {
          type: effectKeywords.log.warn,
          message: `Speed multiplier already at ${current}x`,
        },
      ];
    }
    return [
      {
        type: effectKeywords.engine.stage,
        command: { type: commandKeywords.setSpeedMultiplier, value },
      },
      {
        type: effectKeywords.config.update,
        state: ctx.nextState(state, (draft) => {
          draft.config.speedMultiplier = value;
        }),
      },
    ];
  },

  [eventKeywords.controls.gridVisualizationToggled]: (
    state: RuntimeStore,
    _event,
    ctx
  ): ControlEffect[] => {
    const enabled = !state.config.visualizeGrid;
    return [
      {
        type: effectKeywords.engine.stage,
        command: { type: commandKeywords.setGridVisualization, enabled },
      },
      {
        type: effectKeywords.config.update,
        state: ctx.nextState(state, (draft) => {
          draft.config.visualizeGrid = enabled;
        }),
      },
    ];
  },

  [eventKeywords.controls.reconfigured]: (
    state: RuntimeStore,
    event,
    ctx
  ): ControlEffect[] => {
    return [
      {
        type: effectKeywords.engine.stage,
        command: { type: commandKeywords.reconfigure, config: event.config },
      },
      {
        type: effectKeywords.config.update,
        state: ctx.nextState(state, (draft) => {
          draft.config = event.config;
          draft.presetId = event.presetId;
        }),
      },
    ];
  },

  [eventKeywords.simulation.stopped]: (): ControlEffect[] => [
    { type: effectKeywords.engine.stop },
  ],
} satisfies EventHandlerMap<
  AllEvents,
  ControlEffect,
  RuntimeStore,
  HandlerContext
>;

// ============================================
// Effect Executors (Side Effects)
// ============================================

type ExecutorContext = {
  store: RuntimeStoreApi;
  engine: EngineResource;
};

const executors = {
  [effectKeywords.config.update]: (effect, ctx) => {
    ctx.store.setState(effect.state);
  },

  [effectKeywords.engine.stage]: (effect, ctx) => {
    ctx.engine.stage(effect.command);
  },

  [effectKeywords.engine.stop]: (_effect, ctx) => {
    ctx.engine.stop();
  },

  [effectKeywords.log.warn]: (effect) => {
    console.warn(`[runtimeController] ${effect.message}`);
  },
} satisfies EffectExecutorMap<ControlEffect, AllEvents, ExecutorContext>;

// ============================================
// Runtime Controller Resource
// ============================================

function createRuntimeController(
  store: RuntimeStoreApi,
  engine: EngineResource
) {
  const createControlLoop = emergentSystem<
    AllEvents,
    ControlEffect,
    RuntimeStore,
    HandlerContext,
    ExecutorContext
  >();

  const runtime = createControlLoop({
    getState: () => store.getState(),
    handlers,
    executors,
    handlerContext: {
      nextState: (current, mutation) => produce(current, mutation),
    },
    executorContext: {
      store,
      engine,
    },
  });

  const validateEvent = (input: unknown): AllEvents => {
    const parsed = allEventSchema.safeParse(input);
    if (!parsed.success) {
      throw new ConfigurationError(
        "Invalid control event",
        parsed.error.issues.map((issue) => issue.message)
      );
    }
    return parsed.data;
  };

  /**
   * Every event is validated before it reaches the handlers, so the store
   * never takes a value the engine would refuse
   */
  const dispatch = (event: AllEvents) => {
    runtime.dispatch(validateEvent(event));
  };

  /**
   * Raw input (from a CLI or socket)
   */
  const dispatchInput = (input: unknown) => {
    runtime.dispatch(validateEvent(input));
  };

  /**
   * Lay a patch over the active config. Invalid patches throw here,
   * before anything is staged.
   */
  const reconfigure = (patch: SimulationConfigPatch) => {
    const config = resolveSimulationConfig(patch, store.getState().config);
    dispatch({
      type: eventKeywords.controls.reconfigured,
      config,
      presetId: store.getState().presetId,
    });
  };

  /**
   * Switch to a preset. Presets build on the defaults, not the current
   * config.
   */
  const loadPreset = (presetId: string) => {
    const config = resolveSimulationConfig(getPreset(presetId).config);
    console.log(`[runtimeController] Loading preset: ${presetId}`);
    dispatch({
      type: eventKeywords.controls.reconfigured,
      config,
      presetId,
    });
  };

  /**
   * Stage a resolved config and record it in the store right away, for
   * callers that step the engine in the same tick (the auto-test)
   */
  const stageConfig = (config: SimulationConfig) => {
    engine.stage({ type: commandKeywords.reconfigure, config });
    store.setState(
      produce(store.getState(), (draft) => {
        draft.config = config;
      })
    );
  };

  return {
    dispatch,
    dispatchInput,
    reconfigure,
    loadPreset,
    stageConfig,
    dispose: runtime.dispose,
  };
}

export type RuntimeController = ReturnType<typeof createRuntimeController>;

export const runtimeController = defineResource({
  dependencies: ["config", "engine"],
  start: ({
    config,
    engine,
  }: {
    config: ConfigResource;
    engine: EngineResource;
  }) => {
    console.log("[runtimeController] Starting");
    return createRuntimeController(config.store, engine);
  },
  halt: (controller) => {
    controller.dispose();
  },
});
