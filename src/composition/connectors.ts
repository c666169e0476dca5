import { ConfigurationError } from "../core/errors";
import {
  createHttpConnectorConfig,
  HTTP_CONNECTOR_ID,
  HttpManifestConnector
} from "../infrastructure/http/HttpManifestConnector";
import {
  createLocalConnectorConfig,
  LOCAL_CONNECTOR_ID,
  LocalFilesystemConnector
} from "../infrastructure/local/LocalFilesystemConnector";
import type { SourceConnector } from "../ports/SourceConnector";
import { assertDependencies, type ModuleResolver } from "../shared/dependencies/hasDependency";
import type { Logger } from "../shared/logging/logger";

export type ConnectorOptions = {
  remoteUrl?: string;
  recursive?: boolean;
  token?: string;
};

export type ConnectorEntry = {
  /** Packages that must resolve before the connector can be constructed. */
  requiredDependencies: readonly string[];
  create(options: ConnectorOptions, logger: Logger): SourceConnector;
};

export const connectorRegistry = {
  [LOCAL_CONNECTOR_ID]: {
    requiredDependencies: [],
    create: (options, logger) =>
      new LocalFilesystemConnector(createLocalConnectorConfig(options), logger.child({ connector: LOCAL_CONNECTOR_ID }))
  },
  [HTTP_CONNECTOR_ID]: {
    requiredDependencies: [],
    create: (options, logger) =>
      new HttpManifestConnector(createHttpConnectorConfig(options), logger.child({ connector: HTTP_CONNECTOR_ID }))
  }
} satisfies Record<string, ConnectorEntry>;

export type ConnectorId = keyof typeof connectorRegistry;

export const CONNECTOR_IDS = Object.keys(connectorRegistry).filter(isConnectorId);

export function isConnectorId(value: string): value is ConnectorId {
  return Object.prototype.hasOwnProperty.call(connectorRegistry, value);
}

export const createConnector = (
  id: string,
  options: ConnectorOptions,
  logger: Logger,
  resolve?: ModuleResolver
): SourceConnector => {
  if (!isConnectorId(id)) {
    throw new ConfigurationError(`Unknown connector "${id}". Value must be one of: ${CONNECTOR_IDS.join(", ")}`, {
      field: "connector"
    });
  }
  const entry: ConnectorEntry = connectorRegistry[id];
  assertDependencies(entry.requiredDependencies, { connector: id }, resolve);
  return entry.create(options, logger);
};
