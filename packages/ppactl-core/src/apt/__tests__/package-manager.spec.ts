import { describe, it, expect } from "vitest";
import { PackageManager } from "../package-manager";
import { fakeRunner } from "../../__tests__/fakes";

const config = { aptUpdateCommand: "apt-get update", aptUpgradeCommand: "apt-get dist-upgrade -y" };

describe("PackageManager", () => {
  it("should run the configured commands non-interactively", async () => {
    const run = fakeRunner();
    const apt = new PackageManager(config, run);

    expect(await apt.refreshIndex()).toEqual({ step: "refresh-index", ok: true });
    expect(await apt.upgradeAll()).toEqual({ step: "upgrade", ok: true });
    expect(run.mock.calls).toEqual([
      ["apt-get update", { env: { DEBIAN_FRONTEND: "noninteractive" }, stdio: "inherit" }],
      ["apt-get dist-upgrade -y", { env: { DEBIAN_FRONTEND: "noninteractive" }, stdio: "inherit" }],
    ]);
  });

  it("should send package manager output where it is told to", async () => {
    const run = fakeRunner();
    await new PackageManager(config, run, "stderr").refreshIndex();

    expect(run).toHaveBeenCalledWith("apt-get update", { env: { DEBIAN_FRONTEND: "noninteractive" }, stdio: "stderr" });
  });

  it("should report a failing step instead of throwing", async () => {
    const apt = new PackageManager(config, fakeRunner(["apt-get update"]));

    expect(await apt.refreshIndex()).toEqual({
      step: "refresh-index",
      ok: false,
      error: "Command failed (100): apt-get update\nE: simulated failure",
    });
  });
});
