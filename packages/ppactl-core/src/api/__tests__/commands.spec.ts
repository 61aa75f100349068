import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { join } from "node:path";
import { mkdtemp, readFile, rm } from "node:fs/promises";
import { tmpdir } from "node:os";
import { BuildStatus, type PpaConfig } from "@ppactl/contracts";
import { createContext, install, list, remove, update, branchRepository } from "..";
import { DEFAULT_CONFIG } from "../../config/config";
import { BuildGateError, NotFoundError, PermissionError, ValidationError } from "../../errors";
import { exists } from "../../utils/fs";
import { FakeHttpClient, fakeRunner, json, ok200 } from "../../__tests__/fakes";

const PR_URL = "https://api.github.com/repos/example-org/myrepo/pulls/42";
const buildUrl = (job: string) => `https://ci.example.com/job/example-org/job/myrepo/job/${job}/lastBuild/api/json`;

describe("command operations", () => {
  let tmpRoot: string;
  let config: PpaConfig;
  let http: FakeHttpClient;
  let run: ReturnType<typeof fakeRunner>;

  const root = { uid: 0, root: true };
  const listFile = (name: string) => join(config.listDir, `ppactl-${name}.list`);
  const commands = () => run.mock.calls.map(([cmd]) => cmd);
  const context = (privilege = root) => createContext({ config, privilege, http, run });

  beforeEach(async () => {
    tmpRoot = await mkdtemp(join(tmpdir(), "ppactl-commands-test-"));
    config = {
      ...DEFAULT_CONFIG,
      listDir: join(tmpRoot, "sources.list.d"),
      preferencesDir: join(tmpRoot, "preferences.d"),
      sentinelPath: join(tmpRoot, ".writable_image"),
    };
    http = new FakeHttpClient({ "http://repo.example.com/dists/stable/": ok200 });
    run = fakeRunner();
  });

  afterEach(async () => {
    await rm(tmpRoot, { recursive: true, force: true });
  });

  describe("install", () => {
    it("should enable the repository and upgrade inside the mount guard", async () => {
      const result = await install(context(), { repo: "stable" });

      expect(result).toMatchObject({ ok: true, repository: "stable", added: true, release: { state: "remounted-ro" } });
      expect(await readFile(listFile("stable"), "utf8")).toBe("deb http://repo.example.com/ stable main\n");
      expect(commands()).toEqual([
        "mount -o remount,rw /",
        "apt-get update",
        "apt-get dist-upgrade -y",
        "sync",
        "mount -o remount,ro /",
      ]);
    });

    it("should refuse a pull request whose build failed without touching the device", async () => {
      http.route(PR_URL, json({ number: 42, head: { ref: "feature-x" } }));
      http.route(buildUrl("feature-x"), json({ building: false, result: "FAILURE" }));

      await expect(install(context(), { repo: "myrepo", pr: 42 })).rejects.toThrow(
        new BuildGateError("build of myrepo#42 (feature-x) failed, refusing to install"),
      );
      expect(await exists(listFile("myrepo"))).toBe(false);
      expect(await exists(listFile("feature-x"))).toBe(false);
      expect(run).not.toHaveBeenCalled();
    });

    it("should refuse a pull request that is still building", async () => {
      http.route(PR_URL, json({ number: 42, head: { ref: "feature-x" } }));
      http.route(buildUrl("feature-x"), json({ building: true, result: null }));

      await expect(install(context(), { repo: "myrepo", pr: 42 })).rejects.toThrow(
        "myrepo#42 (feature-x) is still building, try again later",
      );
      expect(run).not.toHaveBeenCalled();
    });

    it("should enable the branch repository of a successful pull request", async () => {
      http.route(PR_URL, json({ number: 42, head: { ref: "feature/x" } }));
      http.route(buildUrl("feature%252Fx"), json({ building: false, result: "SUCCESS" }));
      http.route("http://repo.example.com/dists/feature-x/", ok200);

      const result = await install(context(), { repo: "myrepo", pr: 42 });

      expect(result).toMatchObject({ ok: true, repository: "feature-x", branch: "feature/x", status: BuildStatus.Success });
      expect(await readFile(listFile("feature-x"), "utf8")).toBe("deb http://repo.example.com/ feature-x main\n");
    });

    it("should keep the list file when the upgrade fails", async () => {
      run = fakeRunner(["apt-get dist-upgrade -y"]);

      const result = await install(context(), { repo: "stable" });

      expect(result.ok).toBe(false);
      expect(result.steps).toEqual([
        { step: "refresh-index", ok: true },
        { step: "upgrade", ok: false, error: "Command failed (100): apt-get dist-upgrade -y\nE: simulated failure" },
      ]);
      expect(await exists(listFile("stable"))).toBe(true);
      expect(commands().slice(-2)).toEqual(["sync", "mount -o remount,ro /"]);
    });

    it("should release the guard when the repository is not published", async () => {
      await expect(install(context(), { repo: "missing" })).rejects.toBeInstanceOf(NotFoundError);
      expect(commands()).toEqual(["mount -o remount,rw /", "sync", "mount -o remount,ro /"]);
    });

    it("should require root", async () => {
      await expect(install(context({ uid: 1000, root: false }), { repo: "stable" })).rejects.toBeInstanceOf(
        PermissionError,
      );
      expect(await exists(listFile("stable"))).toBe(false);
    });

    it("should validate the name before remounting", async () => {
      await expect(install(context(), { repo: "-bad" })).rejects.toBeInstanceOf(ValidationError);
      expect(run).not.toHaveBeenCalled();
    });
  });

  describe("remove", () => {
    it("should fail when the repository is not installed", async () => {
      await expect(remove(context(), { repo: "unknownrepo" })).rejects.toThrow(
        new NotFoundError("repository unknownrepo is not installed"),
      );
      expect(run).not.toHaveBeenCalled();
    });

    it("should disable the repository and upgrade", async () => {
      await install(context(), { repo: "stable" });
      run.mockClear();

      const result = await remove(context(), { repo: "stable" });

      expect(result).toMatchObject({ ok: true, repository: "stable" });
      expect(await exists(listFile("stable"))).toBe(false);
      expect(commands()).toEqual([
        "mount -o remount,rw /",
        "apt-get update",
        "apt-get dist-upgrade -y",
        "sync",
        "mount -o remount,ro /",
      ]);
    });
  });

  describe("list", () => {
    it("should return installed repositories without remounting", async () => {
      http.route("http://repo.example.com/dists/beta/", ok200);
      await install(context(), { repo: "stable" });
      await install(context(), { repo: "beta" });
      run.mockClear();

      expect(await list(context())).toEqual(["beta", "stable"]);
      expect(run).not.toHaveBeenCalled();
    });
  });

  describe("update", () => {
    it("should report a failed refresh and still upgrade", async () => {
      run = fakeRunner(["apt-get update"]);

      const result = await update(context());

      expect(result.ok).toBe(false);
      expect(result.release).toEqual({ state: "remounted-ro" });
      expect(commands()).toContain("apt-get dist-upgrade -y");
    });

    it("should route package manager output to stderr when asked", async () => {
      await update(createContext({ config, privilege: root, http, run, aptOutput: "stderr" }));

      const apt = run.mock.calls.filter(([cmd]) => cmd.startsWith("apt-get"));
      expect(apt.map(([, opts]) => opts?.stdio)).toEqual(["stderr", "stderr"]);
    });
  });
});

describe("branchRepository", () => {
  it("should replace characters that are not valid in repository names", () => {
    expect(branchRepository("feature/x")).toBe("feature-x");
    expect(branchRepository("xenial_-_fix")).toBe("xenial_-_fix");
    expect(branchRepository("/leading")).toBe("leading");
  });
});
