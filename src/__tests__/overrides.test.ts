import { resolveConfigPath } from "../config.js";
import { getRuntimeOverrides, setRuntimeOverrides } from "../runtime/overrides.js";

describe("runtime overrides", () => {
  afterEach(() => {
    setRuntimeOverrides({ overrides: {} });
  });

  test("sets and reads overrides", () => {
    setRuntimeOverrides({ overrides: { configPath: "/tmp/other.yaml" } });
    expect(getRuntimeOverrides().configPath).toBe("/tmp/other.yaml");
  });

  test("config path override wins over the default", () => {
    expect(resolveConfigPath({ defaultPath: "/repo/lockstep.yaml" })).toBe("/repo/lockstep.yaml");
    setRuntimeOverrides({ overrides: { configPath: "/tmp/other.yaml" } });
    expect(resolveConfigPath({ defaultPath: "/repo/lockstep.yaml" })).toBe("/tmp/other.yaml");
  });
});
