/**
 * Observable device values, owned per node and keyed by
 * command class, instance and index.
 */

import { EventEmitter } from "node:events";

export type ValueGenre = "basic" | "user" | "config" | "system";

/** One selectable entry of a list value */
export interface ValueListItem {
  label: string;
  value: number;
}

export interface ValueId {
  nodeId: number;
  commandClassId: number;
  instance: number;
  index: number;
}

interface BaseValue {
  id: ValueId;
  genre: ValueGenre;
  label: string;
  units: string;
  readOnly: boolean;
  persisted: boolean;
}

export interface ListValue extends BaseValue {
  type: "list";
  items: readonly ValueListItem[];
  selected: ValueListItem;
}

export interface BoolValue extends BaseValue {
  type: "bool";
  state: boolean;
}

export interface ByteValue extends BaseValue {
  type: "byte";
  state: number;
}

export type Value = ListValue | BoolValue | ByteValue;

/** What a command class supplies when it registers a list value */
export interface ListValueDefinition {
  genre: ValueGenre;
  label: string;
  units: string;
  readOnly: boolean;
  persisted: boolean;
  items: readonly ValueListItem[];
  defaultIndex: number;
}

/**
 * The view of a node's values a single command class works through.
 */
export interface ValueStore {
  getValue(instance: number, index: number): Value | undefined;
  setValue(instance: number, index: number, code: number): boolean;
  registerEnumeratedValue(instance: number, index: number, definition: ListValueDefinition): ListValue;
}

export type ValueListener = (value: Value, previous?: Value) => void;

function valueKey(commandClassId: number, instance: number, index: number): string {
  return `${commandClassId}:${instance}:${index}`;
}

/**
 * All values of one node. Emits "added" when a value is registered and
 * "changed" when a selection moves to a different item.
 */
export class NodeValues {
  private values = new Map<string, Value>();
  private events = new EventEmitter();

  constructor(readonly nodeId: number) {}

  /**
   * Subscribe to value events. Returns an unsubscribe function.
   */
  on(event: "added" | "changed", listener: ValueListener): () => void {
    this.events.on(event, listener);
    return () => this.events.removeListener(event, listener);
  }

  get(commandClassId: number, instance: number, index: number): Value | undefined {
    return this.values.get(valueKey(commandClassId, instance, index));
  }

  getAll(): Value[] {
    return [...this.values.values()].sort(
      (a, b) =>
        a.id.commandClassId - b.id.commandClassId || a.id.instance - b.id.instance || a.id.index - b.id.index
    );
  }

  forCommandClass(commandClassId: number): ValueStore {
    return {
      getValue: (instance, index) => this.get(commandClassId, instance, index),
      setValue: (instance, index, code) => this.select(commandClassId, instance, index, code),
      registerEnumeratedValue: (instance, index, definition) =>
        this.createValueList(commandClassId, instance, index, definition),
    };
  }

  createValueList(
    commandClassId: number,
    instance: number,
    index: number,
    definition: ListValueDefinition
  ): ListValue {
    const selected = definition.items[definition.defaultIndex];
    if (!selected) {
      throw new Error(
        `Default index ${definition.defaultIndex} out of range for '${definition.label}' ` +
          `(${definition.items.length} items)`
      );
    }

    const value: ListValue = {
      id: { nodeId: this.nodeId, commandClassId, instance, index },
      type: "list",
      genre: definition.genre,
      label: definition.label,
      units: definition.units,
      readOnly: definition.readOnly,
      persisted: definition.persisted,
      items: [...definition.items],
      selected,
    };

    this.values.set(valueKey(commandClassId, instance, index), value);
    this.events.emit("added", value);
    return value;
  }

  /**
   * Move a list value's selection to the item carrying `code`.
   * Returns false when there is no such list value or item.
   */
  select(commandClassId: number, instance: number, index: number, code: number): boolean {
    const key = valueKey(commandClassId, instance, index);
    const current = this.values.get(key);
    if (!current || current.type !== "list") return false;

    const item = current.items.find((i) => i.value === code);
    if (!item) return false;
    if (item.value === current.selected.value) return true;

    const next: ListValue = { ...current, selected: item };
    this.values.set(key, next);
    this.events.emit("changed", next, current);
    return true;
  }
}

/**
 * Copy of a list value with `code` selected, as a caller would hand it
 * to a command class to request a change. Undefined when no item matches.
 */
export function withSelection(value: ListValue, code: number): ListValue | undefined {
  const item = value.items.find((i) => i.value === code);
  return item ? { ...value, selected: item } : undefined;
}
