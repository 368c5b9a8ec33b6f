import React, { useEffect, useMemo, useReducer, useState } from "react";
import { Box, Text, render, useInput } from "ink";
import type { StandardizedModel } from "../../llm/index";
import { errorMessage } from "../../llm/errors";

export interface ModelPickerOutcome {
  modelId?: string;
  cancelled?: boolean;
  aborted?: boolean;
}

export interface ModelPickerProps {
  pageSize: number;
  currentModelId?: string;
  loadModels: () => Promise<StandardizedModel[]>;
  onDone: (result: ModelPickerOutcome) => void;
}

export interface PickerState {
  filter: string;
  shown: number;
  selected: number;
}

export type PickerAction =
  | { type: "type"; text: string }
  | { type: "erase" }
  | { type: "clear-filter"; pageSize: number }
  | { type: "move"; by: number; visible: number }
  | { type: "more"; pageSize: number; total: number };

export function pickerReducer(state: PickerState, action: PickerAction): PickerState {
  switch (action.type) {
    case "type":
      return { ...state, filter: state.filter + action.text, selected: 0 };
    case "erase":
      return state.filter ? { ...state, filter: state.filter.slice(0, -1), selected: 0 } : state;
    case "clear-filter":
      return { filter: "", shown: action.pageSize, selected: 0 };
    case "move": {
      const last = Math.max(action.visible - 1, 0);
      return { ...state, selected: Math.min(Math.max(state.selected + action.by, 0), last) };
    }
    case "more":
      return { ...state, shown: Math.max(Math.min(state.shown + action.pageSize, action.total), state.shown) };
  }
}

export function filterModels(models: readonly StandardizedModel[], filter: string): StandardizedModel[] {
  const q = filter.trim().toLowerCase();
  if (!q) return [...models];
  return models.filter((m) => m.id.toLowerCase().includes(q) || (m.name ?? "").toLowerCase().includes(q));
}

function describeModel(model: StandardizedModel): string {
  const label = model.name && model.name !== model.id ? `${model.name} [${model.id}]` : model.id;
  return model.context_length ? `${label} · ${model.context_length.toLocaleString("en-US")} tokens` : label;
}

export function ModelPickerApp({ pageSize, currentModelId, loadModels, onDone }: ModelPickerProps) {
  const [models, setModels] = useState<StandardizedModel[]>();
  const [loadError, setLoadError] = useState<string>();
  const [state, dispatch] = useReducer(pickerReducer, { filter: "", shown: pageSize, selected: 0 });

  useEffect(() => {
    let mounted = true;
    void loadModels().then(
      (loaded) => {
        if (mounted) setModels(loaded);
      },
      (error: unknown) => {
        if (mounted) setLoadError(errorMessage(error));
      },
    );
    return () => {
      mounted = false;
    };
  }, [loadModels]);

  const matching = useMemo(() => filterModels(models ?? [], state.filter), [models, state.filter]);
  const visible = matching.slice(0, state.shown);

  useInput((input, key) => {
    if (key.ctrl && input.toLowerCase() === "c") return onDone({ aborted: true });
    if (key.escape) {
      return state.filter ? dispatch({ type: "clear-filter", pageSize }) : onDone({ cancelled: true });
    }
    if (key.upArrow || key.downArrow) {
      return dispatch({ type: "move", by: key.upArrow ? -1 : 1, visible: visible.length });
    }
    if (key.return) {
      const chosen = visible[state.selected];
      if (chosen) onDone({ modelId: chosen.id });
      return;
    }
    if (key.backspace || key.delete) return dispatch({ type: "erase" });
    if (input === " ") return dispatch({ type: "more", pageSize, total: matching.length });
    if (!key.ctrl && !key.meta && /^[\x20-\x7e]+$/.test(input)) dispatch({ type: "type", text: input });
  });

  const heading = state.filter
    ? `Filter: "${state.filter}" (${visible.length}/${matching.length})`
    : `Pick a model (${visible.length}/${matching.length})`;

  return (
    <Box flexDirection="column">
      <Text bold>{heading}</Text>
      {currentModelId ? <Text dimColor>Current: {currentModelId}</Text> : null}
      <Box flexDirection="column" marginTop={1}>
        {loadError ? (
          <Text color="red">{loadError}</Text>
        ) : !models ? (
          <Text dimColor>Loading models...</Text>
        ) : visible.length === 0 ? (
          <Text dimColor>No models match your filter.</Text>
        ) : (
          visible.map((model, i) => {
            const active = i === state.selected;
            return (
              <Text key={model.id} color={active ? "cyan" : undefined}>
                {`${active ? ">" : " "} ${i + 1}) ${describeModel(model)}`}
              </Text>
            );
          })
        )}
      </Box>
      <Box marginTop={1}>
        <Text dimColor>[↑↓] Move  [Space] More  [Enter] Select  [Esc] Clear filter / cancel</Text>
      </Box>
    </Box>
  );
}

export function runModelPicker(options: {
  pageSize?: number;
  currentModelId?: string;
  loadModels: () => Promise<StandardizedModel[]>;
}): Promise<ModelPickerOutcome> {
  return new Promise((resolve) => {
    let settled = false;
    const finish = (outcome: ModelPickerOutcome) => {
      if (settled) return;
      settled = true;
      instance.clear();
      instance.unmount();
      // Resolve after Ink has released stdin.
      queueMicrotask(() => resolve(outcome));
    };
    const instance = render(
      <ModelPickerApp
        pageSize={options.pageSize ?? 10}
        currentModelId={options.currentModelId}
        loadModels={options.loadModels}
        onDone={finish}
      />,
      { exitOnCtrlC: false },
    );
  });
}
