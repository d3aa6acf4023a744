/**
 * Unit tests for error handling
 */

import { describe, it, expect } from "vitest";
import { CommanderError, InvalidArgumentError } from "commander";
import { CapacityExceededError, InvalidIndexError } from "@trimseq/core";
import { CliError, VerificationError, mapErrorToExitCode, formatCliError } from "../src/lib/errors.js";

describe("error handling", () => {
  describe("CliError", () => {
    it("should create error with default exit code 1", () => {
      const err = new CliError("test error");
      expect(err.message).toBe("test error");
      expect(err.exitCode).toBe(1);
      expect(err.name).toBe("CliError");
    });

    it("should create error with custom exit code", () => {
      expect(new CliError("bad flag", { exitCode: 3 }).exitCode).toBe(3);
    });

    it("should support cause", () => {
      const cause = new Error("underlying error");
      expect(new CliError("wrapper", { cause }).cause).toBe(cause);
    });
  });

  describe("VerificationError", () => {
    it("should name the subject and exit with 2", () => {
      const err = new VerificationError("chunked", "index 5: expected 1, got 2");
      expect(err).toBeInstanceOf(CliError);
      expect(err.name).toBe("VerificationError");
      expect(err.subject).toBe("chunked");
      expect(err.message).toBe("Verification failed for chunked: index 5: expected 1, got 2");
      expect(err.exitCode).toBe(2);
    });
  });

  describe("mapErrorToExitCode", () => {
    it("should use a CliError's own exit code", () => {
      expect(mapErrorToExitCode(new CliError("x", { exitCode: 3 }))).toBe(3);
      expect(mapErrorToExitCode(new VerificationError("sliding", "x"))).toBe(2);
    });

    it("should map commander usage errors to 3", () => {
      expect(mapErrorToExitCode(new InvalidArgumentError("bad"))).toBe(3);
      expect(mapErrorToExitCode(new CommanderError(1, "commander.unknownOption", "unknown"))).toBe(3);
      expect(mapErrorToExitCode(new CommanderError(1, "commander.unknownCommand", "unknown"))).toBe(3);
    });

    it("should keep commander's code for help and version", () => {
      expect(mapErrorToExitCode(new CommanderError(0, "commander.helpDisplayed", "(outputHelp)"))).toBe(0);
      expect(mapErrorToExitCode(new CommanderError(0, "commander.version", "0.1.0"))).toBe(0);
    });

    it("should map library and unknown errors to 1", () => {
      expect(mapErrorToExitCode(new CapacityExceededError(10, 10))).toBe(1);
      expect(mapErrorToExitCode(new Error("boom"))).toBe(1);
      expect(mapErrorToExitCode("boom")).toBe(1);
    });
  });

  describe("formatCliError", () => {
    it("should prefix library errors with their code", () => {
      expect(formatCliError(new InvalidIndexError(-1, "negative"))).toBe("[E_INDEX] Invalid index -1: negative");
    });

    it("should truncate long messages", () => {
      const formatted = formatCliError(new Error("x".repeat(2500)));
      expect(formatted).toBe("x".repeat(2000) + "... (truncated)");
    });

    it("should add cause and stack only when verbose", () => {
      const err = new CliError("outer", { cause: new Error("inner") });
      expect(formatCliError(err)).toBe("outer");

      expect(formatCliError(err, true)).toBe(`outer\n  Cause: Error: inner\n${err.stack ?? ""}`);
    });

    it("should stringify non-errors", () => {
      expect(formatCliError(42)).toBe("42");
    });
  });
});
