import { describe, it, expect, vi } from "vitest";
import type { Logger } from "./lib.js";
import { ACK, checksum } from "./protocol/index.js";
import { createProtectionNode, decodeFrame, formatProtectionValue } from "./session.js";

function applicationCommandFrame(nodeId: number, command: number[]): number[] {
  const body = [command.length + 6, 0x00, 0x04, 0x00, nodeId, command.length, ...command];
  return [0x01, ...body, checksum(body)];
}

const reportFrame = (nodeId: number, state: number) => applicationCommandFrame(nodeId, [0x75, 0x03, state]);

function createLoggerSpy(): Logger {
  return { info: vi.fn(), warn: vi.fn(), debug: vi.fn() };
}

describe("formatProtectionValue", () => {
  it("prints node, label and code", () => {
    expect(formatProtectionValue(createProtectionNode(4))).toBe("Node 4: Unprotected (0)");
  });
});

describe("decodeFrame", () => {
  it("takes the first command without a node filter", () => {
    const result = decodeFrame([ACK, ...reportFrame(13, 2), ...reportFrame(12, 1)], { logger: createLoggerSpy() });
    expect(result.handled).toBe(true);
    expect(result.node.nodeId).toBe(13);
    expect(formatProtectionValue(result.node)).toBe("Node 13: No Operation Possible (2)");
  });

  it("skips commands from other nodes when filtered", () => {
    const result = decodeFrame([...reportFrame(13, 2), ...reportFrame(12, 1)], {
      nodeId: 12,
      logger: createLoggerSpy(),
    });
    expect(result.command.sourceNodeId).toBe(12);
    expect(formatProtectionValue(result.node)).toBe("Node 12: Protection by Sequence (1)");
  });

  it("throws when the filtered node sent nothing", () => {
    expect(() => decodeFrame(reportFrame(13, 2), { nodeId: 14 })).toThrow(
      "No application command from node 14 in input"
    );
  });

  it("throws when there is no command at all", () => {
    expect(() => decodeFrame([])).toThrow("No application command found in input");
    expect(() => decodeFrame([ACK])).toThrow("No application command found in input");
  });

  it("rejects a source node outside the node id range", () => {
    expect(() => decodeFrame(reportFrame(0, 1))).toThrow(/Invalid node id: 0/);
    expect(() => decodeFrame(reportFrame(233, 1))).toThrow(/Invalid node id: 233/);
  });

  it("reports other command classes as not handled", () => {
    const logger = createLoggerSpy();
    const result = decodeFrame(applicationCommandFrame(12, [0x25, 0x03, 0xff]), { logger });
    expect(result.handled).toBe(false);
    expect(result.command.commandClassId).toBe(0x25);
    expect(formatProtectionValue(result.node)).toBe("Node 12: Unprotected (0)");
    expect(logger.debug).toHaveBeenCalledWith("Unhandled command 0x25 from node 12: [3, 255]");
  });
});
