import { describe, it, expect } from "@jest/globals";
import {
  validateConfig,
  validateConfigSafe,
  formatZodError,
  configSchema,
} from "../../../core/config/schema.js";

describe("Config Schema Validation", () => {
  describe("validateConfig - valid configurations", () => {
    it("should validate a minimal valid config", () => {
      const result = validateConfig({ region: "us-east-1" });

      expect(result.region).toBe("us-east-1");
      expect(result.credentials).toBeUndefined();
    });

    it("should validate a config with static credentials", () => {
      const result = validateConfig({
        region: "eu-central-1",
        credentials: {
          accessKeyId: "test-key",
          secretAccessKey: "test-secret",
          sessionToken: "test-token",
        },
      });

      expect(result.credentials?.accessKeyId).toBe("test-key");
      expect(result.credentials?.sessionToken).toBe("test-token");
    });

    it("should validate a config with only a profile", () => {
      const result = validateConfig({
        region: "ap-northeast-2",
        credentials: { profile: "audit" },
      });

      expect(result.credentials?.profile).toBe("audit");
    });

    it("should accept GovCloud regions", () => {
      expect(() => validateConfig({ region: "us-gov-west-1" })).not.toThrow();
    });
  });

  describe("validateConfig - region validation", () => {
    it("should reject a missing region", () => {
      expect(() => validateConfig({})).toThrow("Config validation failed:");
    });

    it("should reject an invalid region format", () => {
      expect(() => validateConfig({ region: "useast1" })).toThrow(
        "  - region: Must be a valid AWS region (e.g., us-east-1)"
      );
    });

    it("should reject uppercase regions", () => {
      expect(() => validateConfig({ region: "US-EAST-1" })).toThrow();
    });
  });

  describe("validateConfig - credentials validation", () => {
    it("should reject an access key without a secret", () => {
      expect(() =>
        validateConfig({
          region: "us-east-1",
          credentials: { accessKeyId: "test-key" },
        })
      ).toThrow(
        "  - credentials: accessKeyId and secretAccessKey must be provided together"
      );
    });

    it("should reject a secret without an access key", () => {
      expect(() =>
        validateConfig({
          region: "us-east-1",
          credentials: { secretAccessKey: "test-secret" },
        })
      ).toThrow();
    });

    it("should reject an empty profile name", () => {
      expect(() =>
        validateConfig({
          region: "us-east-1",
          credentials: { profile: "" },
        })
      ).toThrow("  - credentials.profile: Profile name cannot be empty");
    });
  });

  describe("validateConfigSafe", () => {
    it("should return success for a valid config", () => {
      const result = validateConfigSafe({ region: "us-west-2" });

      expect(result.success).toBe(true);
    });

    it("should return the error for an invalid config", () => {
      const result = validateConfigSafe({ region: 42 });

      expect(result.success).toBe(false);
    });
  });

  describe("formatZodError", () => {
    it("should fall back to 'config' for root-level problems", () => {
      const result = configSchema.safeParse("not an object");
      if (result.success) {
        throw new Error("expected validation to fail");
      }

      expect(formatZodError(result.error)).toBe(
        "  - config: Expected object, received string"
      );
    });
  });
});
