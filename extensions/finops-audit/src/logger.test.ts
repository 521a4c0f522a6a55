/**
 * Audit Logging Tests
 */

import { describe, it, expect, afterEach, vi } from "vitest";
import {
  AuditLoggerImpl,
  ConsoleTransport,
  createAuditLogger,
  formatLogEntry,
  getAuditLogger,
  isAuditLogLevel,
  MemoryTransport,
  setAuditLogger,
  type AuditLogEntry,
} from "./logger.js";

const entry: AuditLogEntry = {
  timestamp: new Date("2026-03-01T08:30:00.000Z"),
  level: "warn",
  subsystem: "finops-audit/aggregator",
  message: "Duplicate finding dropped",
  metadata: { resourceId: "vm-1" },
};

describe("isAuditLogLevel", () => {
  it("should recognise level names", () => {
    expect(isAuditLogLevel("warn")).toBe(true);
    expect(isAuditLogLevel("verbose")).toBe(false);
  });
});

describe("formatLogEntry", () => {
  it("should render timestamp, level, subsystem, message and metadata", () => {
    expect(formatLogEntry(entry)).toBe(
      '2026-03-01T08:30:00.000Z WARN  [finops-audit/aggregator] Duplicate finding dropped {"resourceId":"vm-1"}',
    );
  });

  it("should include the resource context", () => {
    expect(formatLogEntry({ ...entry, metadata: {}, kind: "compute", resourceId: "vm-1" })).toBe(
      "2026-03-01T08:30:00.000Z WARN  [finops-audit/aggregator] Duplicate finding dropped (kind=compute resource=vm-1)",
    );
  });

  it("should colour the level when asked", () => {
    expect(formatLogEntry({ ...entry, metadata: undefined }, { colors: true })).toBe(
      "\x1b[2m2026-03-01T08:30:00.000Z\x1b[0m \x1b[33mWARN \x1b[0m [finops-audit/aggregator] Duplicate finding dropped",
    );
  });
});

describe("ConsoleTransport", () => {
  it("should send warnings to console.warn", () => {
    const warn = vi.spyOn(console, "warn").mockImplementation(() => undefined);
    new ConsoleTransport({ colors: false }).write(entry);
    expect(warn).toHaveBeenCalledWith(formatLogEntry(entry));
    warn.mockRestore();
  });
});

describe("AuditLoggerImpl", () => {
  it("should drop entries below its level", () => {
    const memory = new MemoryTransport();
    const logger = createAuditLogger("engine", { level: "warn", transports: [memory] });
    logger.info("Audit started");
    logger.error("Auditor failed");
    expect(memory.messages()).toEqual(["Auditor failed"]);
    expect(memory.entries[0].subsystem).toBe("finops-audit/engine");
  });

  it("should share transports with children and context loggers", () => {
    const memory = new MemoryTransport();
    const logger = new AuditLoggerImpl({ subsystem: "finops-audit", transports: [memory] });
    logger.child("auditor").withContext({ kind: "storage", resourceId: "disk-1" }).warn("Skipping resource");

    expect(memory.entries).toHaveLength(1);
    expect(memory.entries[0]).toMatchObject({
      subsystem: "finops-audit/auditor",
      kind: "storage",
      resourceId: "disk-1",
      level: "warn",
    });
  });

  it("should change level at runtime", () => {
    const memory = new MemoryTransport();
    const logger = createAuditLogger("cli", { transports: [memory] });
    logger.debug("hidden");
    logger.setLevel("debug");
    logger.debug("now visible");
    expect(logger.getLevel()).toBe("debug");
    expect(memory.messages("debug")).toEqual(["now visible"]);
  });
});

describe("global audit logger", () => {
  afterEach(() => setAuditLogger(null));

  it("should return the installed logger and its children", () => {
    const memory = new MemoryTransport();
    setAuditLogger(new AuditLoggerImpl({ subsystem: "custom", transports: [memory] }));
    getAuditLogger().child("engine").info("hello");
    expect(memory.entries[0].subsystem).toBe("custom/engine");
  });

  it("should create a default root logger", () => {
    expect(getAuditLogger().subsystem).toBe("finops-audit");
  });
});
