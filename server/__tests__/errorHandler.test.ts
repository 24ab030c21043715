import { describe, it, expect, vi } from "vitest";
import {
  ValidationError,
  NotFoundError,
  TemplateNotFoundError,
  VersionNotFoundError,
  ConfigurationError,
  ExternalServiceError,
  ModelCallError,
  ModelTimeoutError,
  classifyAnalysisError,
  getErrorMessage,
  getErrorStatusCode,
  handleRouteError,
} from "../utils/errorHandler";
import { z } from "zod";

function mockResponse() {
  const json = vi.fn();
  const status = vi.fn(() => ({ json }));
  return { status, json };
}

describe("Error Classes", () => {
  it("ValidationError has 400 status code", () => {
    const error = new ValidationError("Invalid input");
    expect(error.statusCode).toBe(400);
    expect(error.message).toBe("Invalid input");
    expect(error.name).toBe("ValidationError");
    expect(error.isOperational).toBe(true);
  });

  it("NotFoundError has 404 status code", () => {
    const error = new NotFoundError("Meeting");
    expect(error.statusCode).toBe(404);
    expect(error.message).toBe("Meeting not found");
    expect(error.name).toBe("NotFoundError");
  });

  it("TemplateNotFoundError lists available templates", () => {
    const error = new TemplateNotFoundError("weekly", ["daily_report", "default"]);
    expect(error).toBeInstanceOf(NotFoundError);
    expect(error.statusCode).toBe(404);
    expect(error.message).toBe('Template "weekly" not found (available: daily_report, default)');
  });

  it("VersionNotFoundError names template and version", () => {
    const error = new VersionNotFoundError("default", "9.9", ["1.0", "2.0"]);
    expect(error.message).toBe('Version "9.9" of template "default" not found (available: 1.0, 2.0)');
    expect(error.version).toBe("9.9");
  });

  it("ConfigurationError is not operational", () => {
    const error = new ConfigurationError("templates.json", "bad version key");
    expect(error.statusCode).toBe(500);
    expect(error.isOperational).toBe(false);
    expect(error.message).toBe("Invalid configuration in templates.json: bad version key");
  });

  it("ExternalServiceError has 502 status code", () => {
    const error = new ExternalServiceError("OpenAI", "Rate limit exceeded");
    expect(error.statusCode).toBe(502);
    expect(error.message).toBe("OpenAI error: Rate limit exceeded");
    expect(error.service).toBe("OpenAI");
  });

  it("ModelTimeoutError has 504 status code", () => {
    const error = new ModelTimeoutError("gemini-2.0-flash", 180000);
    expect(error).toBeInstanceOf(ExternalServiceError);
    expect(error.statusCode).toBe(504);
    expect(error.message).toBe("Model gemini-2.0-flash error: no response within 180000ms");
  });
});

describe("getErrorMessage", () => {
  it("extracts message from ZodError", () => {
    const result = z.object({ name: z.string() }).safeParse({ name: 123 });
    expect(result.success).toBe(false);
    if (!result.success) {
      expect(getErrorMessage(result.error)).toContain("Expected string, received number");
    }
  });

  it("extracts message from standard Error", () => {
    expect(getErrorMessage(new Error("Something went wrong"))).toBe("Something went wrong");
  });

  it("returns default message for unknown error types", () => {
    expect(getErrorMessage("string error")).toBe("An unexpected error occurred");
    expect(getErrorMessage(null)).toBe("An unexpected error occurred");
    expect(getErrorMessage(undefined)).toBe("An unexpected error occurred");
    expect(getErrorMessage(42)).toBe("An unexpected error occurred");
  });
});

describe("getErrorStatusCode", () => {
  it("returns 400 for ZodError", () => {
    const result = z.object({ name: z.string() }).safeParse({});
    expect(result.success ? 0 : getErrorStatusCode(result.error)).toBe(400);
  });

  it("returns custom statusCode from AppError", () => {
    expect(getErrorStatusCode(new NotFoundError("X"))).toBe(404);
    expect(getErrorStatusCode(new ValidationError("X"))).toBe(400);
    expect(getErrorStatusCode(new VersionNotFoundError("default", "9.9"))).toBe(404);
    expect(getErrorStatusCode(new ModelCallError("m", "down"))).toBe(502);
  });

  it("returns 500 for standard Error", () => {
    expect(getErrorStatusCode(new Error("oops"))).toBe(500);
  });

  it("returns 500 for unknown types", () => {
    expect(getErrorStatusCode("string")).toBe(500);
    expect(getErrorStatusCode(null)).toBe(500);
  });
});

describe("handleRouteError", () => {
  it("sends correct status and message for NotFoundError", () => {
    const res = mockResponse();
    handleRouteError(res, new NotFoundError("Meeting"), "test");

    expect(res.status).toHaveBeenCalledWith(404);
    expect(res.json).toHaveBeenCalledWith({ error: "Meeting not found" });
  });

  it("sends 400 for ValidationError", () => {
    const res = mockResponse();
    handleRouteError(res, new ValidationError("Bad data"), "test");

    expect(res.status).toHaveBeenCalledWith(400);
    expect(res.json).toHaveBeenCalledWith({ error: "Bad data" });
  });

  it("sends 500 for standard Error", () => {
    const consoleSpy = vi.spyOn(console, "error").mockImplementation(() => {});
    const res = mockResponse();
    handleRouteError(res, new Error("Internal"), "test");

    expect(res.status).toHaveBeenCalledWith(500);
    expect(res.json).toHaveBeenCalledWith({ error: "Internal" });
    consoleSpy.mockRestore();
  });

  it("logs errors for 500+ status codes when context provided", () => {
    const consoleSpy = vi.spyOn(console, "error").mockImplementation(() => {});
    handleRouteError(mockResponse(), new Error("Server error"), "TestContext");

    expect(consoleSpy).toHaveBeenCalled();
    consoleSpy.mockRestore();
  });

  it("does not log for client errors", () => {
    const consoleSpy = vi.spyOn(console, "error").mockImplementation(() => {});
    handleRouteError(mockResponse(), new NotFoundError("Item"), "TestContext");

    expect(consoleSpy).not.toHaveBeenCalled();
    consoleSpy.mockRestore();
  });
});

describe("classifyAnalysisError", () => {
  it("separates timeouts from other model failures", () => {
    expect(classifyAnalysisError(new ModelTimeoutError("m", 10)).kind).toBe("model_timeout");
    expect(classifyAnalysisError(new ModelCallError("m", "down")).kind).toBe("model_call_failed");
  });

  it("treats everything else as internal", () => {
    const classified = classifyAnalysisError(new TypeError("x is undefined"));
    expect(classified.kind).toBe("internal");
    expect(classified.errorMessage).toBe("x is undefined");
  });
});
