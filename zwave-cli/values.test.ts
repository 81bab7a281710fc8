import { describe, it, expect, vi } from "vitest";
import { NodeValues, withSelection, type ListValueDefinition } from "./values.js";

const definition: ListValueDefinition = {
  genre: "system",
  label: "Mode",
  units: "",
  readOnly: false,
  persisted: false,
  items: [
    { label: "Off", value: 0 },
    { label: "On", value: 1 },
  ],
  defaultIndex: 0,
};

describe("NodeValues", () => {
  it("creates a list value with the default item selected", () => {
    const values = new NodeValues(3);
    const value = values.createValueList(0x75, 1, 0, definition);

    expect(value.id).toEqual({ nodeId: 3, commandClassId: 0x75, instance: 1, index: 0 });
    expect(value.type).toBe("list");
    expect(value.selected).toEqual({ label: "Off", value: 0 });
    expect(values.get(0x75, 1, 0)).toBe(value);
  });

  it("throws for a default index outside the items", () => {
    const values = new NodeValues(3);
    expect(() => values.createValueList(0x75, 1, 0, { ...definition, defaultIndex: 2 })).toThrow(
      "Default index 2 out of range for 'Mode' (2 items)"
    );
  });

  it("emits added on creation", () => {
    const values = new NodeValues(3);
    const added = vi.fn();
    values.on("added", added);
    const value = values.createValueList(0x75, 1, 0, definition);
    expect(added).toHaveBeenCalledWith(value);
  });

  it("selects by code and emits changed with the previous value", () => {
    const values = new NodeValues(3);
    const before = values.createValueList(0x75, 1, 0, definition);
    const changed = vi.fn();
    values.on("changed", changed);

    expect(values.select(0x75, 1, 0, 1)).toBe(true);
    const after = values.get(0x75, 1, 0);
    expect(after?.type === "list" && after.selected).toEqual({ label: "On", value: 1 });
    expect(changed).toHaveBeenCalledWith(after, before);
  });

  it("does not emit when the selection is unchanged", () => {
    const values = new NodeValues(3);
    values.createValueList(0x75, 1, 0, definition);
    const changed = vi.fn();
    values.on("changed", changed);

    expect(values.select(0x75, 1, 0, 0)).toBe(true);
    expect(changed).not.toHaveBeenCalled();
  });

  it("rejects unknown codes and missing values", () => {
    const values = new NodeValues(3);
    values.createValueList(0x75, 1, 0, definition);
    expect(values.select(0x75, 1, 0, 5)).toBe(false);
    expect(values.select(0x75, 2, 0, 1)).toBe(false);
  });

  it("stops notifying after unsubscribe", () => {
    const values = new NodeValues(3);
    values.createValueList(0x75, 1, 0, definition);
    const changed = vi.fn();
    const off = values.on("changed", changed);
    off();
    values.select(0x75, 1, 0, 1);
    expect(changed).not.toHaveBeenCalled();
  });

  it("sorts values by class, instance and index", () => {
    const values = new NodeValues(3);
    values.createValueList(0x75, 2, 0, definition);
    values.createValueList(0x20, 1, 0, definition);
    values.createValueList(0x75, 1, 1, definition);
    values.createValueList(0x75, 1, 0, definition);

    expect(values.getAll().map((v) => [v.id.commandClassId, v.id.instance, v.id.index])).toEqual([
      [0x20, 1, 0],
      [0x75, 1, 0],
      [0x75, 1, 1],
      [0x75, 2, 0],
    ]);
  });

  describe("forCommandClass", () => {
    it("scopes reads and writes to one class", () => {
      const values = new NodeValues(3);
      const store = values.forCommandClass(0x75);
      store.registerEnumeratedValue(1, 0, definition);

      expect(store.getValue(1, 0)?.id.commandClassId).toBe(0x75);
      expect(values.forCommandClass(0x20).getValue(1, 0)).toBeUndefined();
      expect(store.setValue(1, 0, 1)).toBe(true);
      expect(values.get(0x20, 1, 0)).toBeUndefined();
    });
  });
});

describe("withSelection", () => {
  it("returns a copy with the matching item selected", () => {
    const value = new NodeValues(3).createValueList(0x75, 1, 0, definition);
    const requested = withSelection(value, 1);
    expect(requested?.selected).toEqual({ label: "On", value: 1 });
    expect(value.selected.value).toBe(0);
  });

  it("returns undefined for an unknown code", () => {
    const value = new NodeValues(3).createValueList(0x75, 1, 0, definition);
    expect(withSelection(value, 7)).toBeUndefined();
  });
});
