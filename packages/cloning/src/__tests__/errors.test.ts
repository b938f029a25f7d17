import { CloneError, getStatusCode, isNotFoundError, toCloneError } from "../errors";
import { attempt } from "../result";

describe("errors", () => {
  it("should read status codes from SDK-shaped errors", () => {
    expect(getStatusCode({ statusCode: 403 })).toBe(403);
    expect(getStatusCode({ statusCode: "403" })).toBeUndefined();
    expect(getStatusCode(new Error("boom"))).toBeUndefined();
    expect(isNotFoundError({ statusCode: 404 })).toBe(true);
  });

  it.each([
    [401, "Unauthenticated"],
    [403, "PermissionDenied"],
    [404, "NotFound"],
    [409, "Conflict"],
    [500, "ProviderFailure"],
  ])("classifies status %d as %s", (statusCode, kind) => {
    const error = toCloneError(Object.assign(new Error("request failed"), { statusCode }), "disk");
    expect(error.kind).toBe(kind);
    expect(error.stage).toBe("disk");
    expect(error.message).toBe("request failed");
  });

  it("should pass CloneErrors through unchanged", () => {
    const original = new CloneError("Conflict", "taken");
    expect(toCloneError(original, "nic")).toBe(original);
  });

  it("should classify non-Error values", () => {
    const error = toCloneError("plain failure");
    expect(error.kind).toBe("ProviderFailure");
    expect(error.message).toBe("plain failure");
  });

  it("should capture thrown errors as failed results", async () => {
    const result = await attempt("nsg", async () => {
      throw Object.assign(new Error("forbidden"), { statusCode: 403 });
    });
    expect(result).toMatchObject({ ok: false, error: { kind: "PermissionDenied", stage: "nsg" } });
  });

  it("should wrap returned values", async () => {
    await expect(attempt("nsg", async () => 7)).resolves.toEqual({ ok: true, value: 7 });
  });
});
