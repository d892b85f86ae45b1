import os from "os";
import path from "path";
import { ConfigError, loadConfig } from "./config";

describe("loadConfig", () => {
  it("uses defaults when nothing is set", () => {
    expect(loadConfig({})).toEqual({
      baseUrl: "https://tahvel.edu.ee/hois_back",
      configDir: path.join(os.homedir(), ".tahvel-checker"),
      pageSize: 50,
      lang: "ET",
    });
  });

  it("reads values from the environment", () => {
    const config = loadConfig({
      TAHVEL_BASE_URL: "https://tahvel.example.test/hois_back/",
      TAHVEL_CONFIG_DIR: "/tmp/tahvel-test",
      TAHVEL_PAGE_SIZE: "100",
      TAHVEL_LANG: "EN",
    });

    expect(config).toEqual({
      baseUrl: "https://tahvel.example.test/hois_back",
      configDir: "/tmp/tahvel-test",
      pageSize: 100,
      lang: "EN",
    });
  });

  it("rejects a page size that is not a positive integer", () => {
    expect(() => loadConfig({ TAHVEL_PAGE_SIZE: "0" })).toThrow(ConfigError);
    expect(() => loadConfig({ TAHVEL_PAGE_SIZE: "ten" })).toThrow(
      'TAHVEL_PAGE_SIZE must be a positive integer, got "ten"'
    );
  });
});
