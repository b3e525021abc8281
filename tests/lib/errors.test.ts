import { describe, it, expect } from "vitest";
import {
  TestgenError,
  ConfigError,
  ContextBuildError,
  GenerationError,
  BackendRequestError,
  NormalizationError,
  ValidationCheckError,
  RunInterruptedError,
} from "@/lib/errors.js";

describe("Error Classes", () => {
  describe("TestgenError", () => {
    it("should create a basic error", () => {
      const error = new TestgenError("Test message", "TEST_CODE");
      expect(error.message).toBe("Test message");
      expect(error.name).toBe("TestgenError");
      expect(error.code).toBe("TEST_CODE");
      expect(error).toBeInstanceOf(Error);
      expect(error).toBeInstanceOf(TestgenError);
    });

    it("should include context when provided", () => {
      const context = { key: "value" };
      const error = new TestgenError("Test message", "TEST_CODE", context);
      expect(error.context).toBe(context);
    });

    it("should keep the cause", () => {
      const cause = new Error("root");
      const error = new TestgenError("Wrapped", "TEST_CODE", undefined, { cause });
      expect(error.cause).toBe(cause);
    });

    it("should serialize to JSON", () => {
      const error = new TestgenError("Test message", "TEST_CODE", { key: "value" });
      expect(error.toJSON()).toEqual({
        name: "TestgenError",
        code: "TEST_CODE",
        message: "Test message",
        context: { key: "value" },
      });
    });
  });

  describe("ConfigError", () => {
    it("should use the config code", () => {
      const error = new ConfigError("Bad value", { key: "qualityThreshold" });
      expect(error.name).toBe("ConfigError");
      expect(error.code).toBe("CONFIG_ERROR");
      expect(error.context).toEqual({ key: "qualityThreshold" });
      expect(error).toBeInstanceOf(TestgenError);
    });
  });

  describe("ContextBuildError", () => {
    it("should carry the file path", () => {
      const error = new ContextBuildError("Cannot read", "/repo/src/sensor.c");
      expect(error.code).toBe("CONTEXT_BUILD_ERROR");
      expect(error.filePath).toBe("/repo/src/sensor.c");
      expect(error.context).toEqual({ filePath: "/repo/src/sensor.c" });
    });
  });

  describe("GenerationError", () => {
    it("should wrap the last backend failure", () => {
      const cause = new BackendRequestError("quota", "gemini:gemini-2.5-flash", 429);
      const error = new GenerationError("All generation backends failed: quota", undefined, { cause });
      expect(error.code).toBe("GENERATION_ERROR");
      expect(error.cause).toBe(cause);
    });
  });

  describe("BackendRequestError", () => {
    it("should record backend and status", () => {
      const error = new BackendRequestError("boom", "openai:gpt-4o", 500);
      expect(error.name).toBe("BackendRequestError");
      expect(error.backend).toBe("openai:gpt-4o");
      expect(error.status).toBe(500);
      expect(error.context).toEqual({ backend: "openai:gpt-4o", status: 500 });
    });
  });

  describe("NormalizationError", () => {
    it("should name the failing step", () => {
      const error = new NormalizationError("failed", "includes");
      expect(error.code).toBe("NORMALIZATION_ERROR");
      expect(error.step).toBe("includes");
    });
  });

  describe("ValidationCheckError", () => {
    it("should name the failing check", () => {
      const error = new ValidationCheckError("failed", "domain-ranges");
      expect(error.code).toBe("VALIDATION_CHECK_ERROR");
      expect(error.checkId).toBe("domain-ranges");
    });
  });

  describe("RunInterruptedError", () => {
    it("should omit context without a file", () => {
      const error = new RunInterruptedError();
      expect(error.message).toBe("Run interrupted");
      expect(error.code).toBe("RUN_INTERRUPTED");
      expect(error.context).toBeUndefined();
    });

    it("should record the interrupted file", () => {
      expect(new RunInterruptedError("/repo/src/a.c").context).toEqual({ filePath: "/repo/src/a.c" });
    });
  });
});
