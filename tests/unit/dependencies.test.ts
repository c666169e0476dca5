import { createConnector, CONNECTOR_IDS } from "../../src/composition/connectors";
import { ConfigurationError, MissingDependencyError } from "../../src/core/errors";
import { HttpManifestConnector } from "../../src/infrastructure/http/HttpManifestConnector";
import { LocalFilesystemConnector } from "../../src/infrastructure/local/LocalFilesystemConnector";
import { assertDependencies, hasDependency } from "../../src/shared/dependencies/hasDependency";
import { createRecordingLogger } from "../helpers/fixtures";

const resolverFor = (installed: string[]) => (id: string) => {
  if (installed.includes(id)) return `/node_modules/${id}/index.js`;
  throw new Error(`Cannot find module '${id}'`);
};

describe("dependency capability checks", () => {
  it("detects packages that resolve from this project", () => {
    expect(hasDependency("minimatch")).toBe(true);
    expect(hasDependency("definitely-not-installed-package")).toBe(false);
  });

  it("lists every missing package with an install hint", () => {
    const attempt = () =>
      assertDependencies(["mongodb", "some-sdk", "other-sdk"], { connector: "sharepoint" }, resolverFor(["mongodb"]));

    expect(attempt).toThrow(MissingDependencyError);
    expect(attempt).toThrow(
      'Missing optional dependencies for connector "sharepoint": some-sdk, other-sdk. Install them with: npm install some-sdk other-sdk'
    );
  });

  it("exposes the missing names on the error", () => {
    try {
      assertDependencies(["some-sdk"], {}, resolverFor([]));
      throw new Error("expected assertDependencies to throw");
    } catch (err) {
      expect(err).toBeInstanceOf(MissingDependencyError);
      if (err instanceof MissingDependencyError) {
        expect(err.missing).toEqual(["some-sdk"]);
        expect(err.code).toBe("dependency_missing");
      }
    }
  });
});

describe("connector registry", () => {
  it("knows the built-in connectors", () => {
    expect(CONNECTOR_IDS).toEqual(["local", "http"]);
  });

  it("builds connectors by id", () => {
    const logger = createRecordingLogger();
    expect(createConnector("local", { remoteUrl: "/tmp" }, logger)).toBeInstanceOf(LocalFilesystemConnector);
    expect(
      createConnector("http", { remoteUrl: "http://127.0.0.1:9/manifest.json", token: "test-secret" }, logger)
    ).toBeInstanceOf(HttpManifestConnector);
  });

  it("rejects unknown connector ids", () => {
    expect(() => createConnector("dropbox", {}, createRecordingLogger())).toThrow(
      'Unknown connector "dropbox". Value must be one of: local, http'
    );
  });

  it("validates connector configuration at construction", () => {
    expect(() => createConnector("local", {}, createRecordingLogger())).toThrow(ConfigurationError);
    expect(() =>
      createConnector("http", { remoteUrl: "http://127.0.0.1:9/manifest.json" }, createRecordingLogger())
    ).toThrow("http connector requires an access token (--token or INGEST_HTTP_TOKEN)");
  });
});
