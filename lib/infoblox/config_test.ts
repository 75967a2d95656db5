import { describe, expect, it } from "vitest";
import { parseConnectorConfig } from "./config.ts";

const required = {
  INFOBLOX_SERVER: "gm.example.test",
  INFOBLOX_USERNAME: "admin",
  INFOBLOX_PASSWORD: "test-secret",
};

describe("parseConnectorConfig", () => {
  it("applies defaults", () => {
    const config = parseConnectorConfig(required);
    expect(config.success && config.data).toEqual({
      server: "gm.example.test",
      username: "admin",
      password: "test-secret",
      port: 443,
      wapiVersion: "2.7",
      sslVerify: false,
      requestTimeoutSec: 60,
    });
  });

  it("reads optional settings", () => {
    const config = parseConnectorConfig({
      ...required,
      PORT: "8443",
      WAPI_VERSION: "2.12",
      SSLMODE: "TRUE",
      CONNECT_TIMEOUT: "10",
    });
    expect(config.success && config.data).toMatchObject({
      port: 8443,
      wapiVersion: "2.12",
      sslVerify: true,
      requestTimeoutSec: 10,
    });
  });

  it("only enables certificate checks for SSLMODE=true", () => {
    const config = parseConnectorConfig({ ...required, SSLMODE: "yes" });
    expect(config.success && config.data.sslVerify).toBe(false);
  });

  it("reports missing credentials", () => {
    const config = parseConnectorConfig({ INFOBLOX_SERVER: "gm.example.test" });
    expect(config.success).toBe(false);
    expect(config.error?.issues.map((i) => i.message)).toEqual([
      "INFOBLOX_USERNAME must be set",
      "INFOBLOX_PASSWORD must be set",
    ]);
  });

  it("rejects a port that is not a number", () => {
    const config = parseConnectorConfig({ ...required, PORT: "https" });
    expect(config.error?.issues.map((i) => i.path)).toEqual([["port"]]);
  });
});
