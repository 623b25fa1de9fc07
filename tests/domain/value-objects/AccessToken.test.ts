import { AccessToken } from "../../../src/domain/value-objects/AccessToken";

describe("AccessToken Value Object", () => {
  const issuedAt = 1_700_000_000_000;

  it("should expose its value and lifetime", () => {
    const token = AccessToken.issue("test-token", 3600, issuedAt);

    expect(token.value).toBe("test-token");
    expect(token.expiresIn).toBe(3600);
    expect(token.issuedAt).toBe(issuedAt);
    expect(token.expiresAt).toBe(issuedAt + 3_600_000);
  });

  it("should not be expired up to and including its expiry instant", () => {
    const token = AccessToken.issue("test-token", 3600, issuedAt);

    expect(token.isExpired(issuedAt)).toBe(false);
    expect(token.isExpired(issuedAt + 3_600_000)).toBe(false);
  });

  it("should be expired after its lifetime", () => {
    const token = AccessToken.issue("test-token", 3600, issuedAt);

    expect(token.isExpired(issuedAt + 3_600_001)).toBe(true);
  });

  it("should reject an empty value", () => {
    expect(() => AccessToken.issue("", 3600, issuedAt)).toThrow("AccessToken value cannot be empty");
  });

  it("should reject a negative lifetime", () => {
    expect(() => AccessToken.issue("test-token", -1, issuedAt)).toThrow(
      "AccessToken expiresIn must be a non-negative number"
    );
  });
});
