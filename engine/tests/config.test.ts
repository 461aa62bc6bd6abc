import { describe, it, expect, beforeEach, afterEach } from "vitest";
import * as fs from "fs";
import * as os from "os";
import * as path from "path";
import {
  buildConfig,
  ConfigError,
  DEFAULT_JVM_OPTIONS,
  DEFAULT_REGISTER_STEPS,
  loadManifest,
  MANIFEST_FILENAME,
} from "../src/config";

describe("config", () => {
  let dir: string;

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), "jarkit-config-"));
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  const writeManifest = (content: string) =>
    fs.writeFileSync(path.join(dir, MANIFEST_FILENAME), content);

  describe("buildConfig", () => {
    it("derives every path from the install directory and defaults", () => {
      const config = buildConfig({ installDir: dir, homeDir: "/home/tester" });

      expect(config.install_dir).toBe(dir);
      expect(config.version).toBe("2025");
      expect(config.artifact_path).toBe(path.join(dir, "app_v2025.jar"));
      expect(config.launcher_path).toBe(path.join(dir, "app-launcher"));
      expect(config.loader_path).toBe(path.join(dir, "loader.jar"));
      expect(config.icon_path).toBe(path.join(dir, "app_icon.ico"));
      expect(config.desktop_entry_path).toBe(
        "/home/tester/.local/share/applications/java-desktop-app.desktop",
      );
      expect(config.bin_link_path).toBe("/usr/local/bin/app-launcher");
      expect(config.jvm_options).toEqual(DEFAULT_JVM_OPTIONS);
      expect(config.register_steps).toEqual(DEFAULT_REGISTER_STEPS);
      expect(config.dependencies.map((d) => d.package)).toEqual([
        "git",
        "jre-openjdk",
        "axel",
      ]);
    });

    it("is frozen", () => {
      const config = buildConfig({ installDir: dir, manifest: {} });
      expect(Object.isFrozen(config)).toBe(true);
      expect(Object.isFrozen(config.jvm_options)).toBe(true);
    });

    it("names the artifact after an overridden version", () => {
      const config = buildConfig({ installDir: dir, manifest: { version: "2026.1" } });
      expect(config.artifact_name).toBe("app_v2026.1.jar");
    });

    it("reads overrides from the manifest file", () => {
      writeManifest(
        [
          "app_name: Sample Tool",
          "launcher_name: sample-tool",
          "jvm_options:",
          "  - -Xmx512m",
          "register_steps:",
          "  - Open the loader.",
        ].join("\n"),
      );

      const config = buildConfig({ installDir: dir, binDir: "/opt/bin" });

      expect(config.app_name).toBe("Sample Tool");
      expect(config.launcher_path).toBe(path.join(dir, "sample-tool"));
      expect(config.bin_link_path).toBe("/opt/bin/sample-tool");
      expect(config.jvm_options).toEqual(["-Xmx512m"]);
      expect(config.register_steps).toEqual(["Open the loader."]);
    });
  });

  describe("loadManifest", () => {
    it("returns an empty manifest when the file is missing", () => {
      expect(loadManifest(dir)).toEqual({});
    });

    it("returns an empty manifest for an empty file", () => {
      writeManifest("");
      expect(loadManifest(dir)).toEqual({});
    });

    it("rejects YAML that does not parse", () => {
      writeManifest("app_name: [unclosed");
      expect(() => loadManifest(dir)).toThrow(/^Cannot parse jarkit\.yaml: /);
    });

    it("names the offending field", () => {
      writeManifest("desktop_entry_name: app.txt\n");
      expect(() => loadManifest(dir)).toThrow(
        "Invalid jarkit.yaml: desktop_entry_name: must end in .desktop",
      );
    });

    it("rejects file names with a directory part", () => {
      writeManifest("launcher_name: ../escape\n");
      expect(() => loadManifest(dir)).toThrow(
        "Invalid jarkit.yaml: launcher_name: must be a plain file name",
      );
    });

    it("rejects unknown keys", () => {
      writeManifest("colour: blue\n");
      expect(() => loadManifest(dir)).toThrow(
        "Invalid jarkit.yaml: (root): Unrecognized key(s) in object: 'colour'",
      );
    });

    it("carries the manifest path on the error", () => {
      writeManifest("version: 'has space'\n");
      try {
        loadManifest(dir);
        expect.unreachable("loadManifest should have thrown");
      } catch (err: unknown) {
        expect(err).toBeInstanceOf(ConfigError);
        if (err instanceof ConfigError) {
          expect(err.file).toBe(path.join(dir, MANIFEST_FILENAME));
        }
      }
    });
  });
});
