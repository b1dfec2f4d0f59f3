import { Command } from "commander";
import { DocumentKeyRouter } from "../../lib/router/index.js";
import { createMongoStorage, logClusterInfo, sanitizeUri } from "../../lib/storage/index.js";
import type { ConnectionCommandOptions } from "../config/types.js";
import { addConnectionOptions, exitWithError, loadConfig } from "./shared.js";

/**
 * Create inspect command: report topology and sharding without running a workload
 */
export function createInspectCommand(): Command {
  const command = new Command("inspect").description(
    "Connect and report cluster topology and collection sharding",
  );

  return addConnectionOptions(command).action(async (opts: ConnectionCommandOptions) => {
    try {
      const config = loadConfig(opts);
      const router = new DocumentKeyRouter({
        topology: config.clusterTopology,
        zones: config.zones,
      });

      const storage = await createMongoStorage({
        uri: config.uri,
        database: config.db,
        collection: config.collection,
        maxPoolSize: 1,
      });

      const clusterType = await logClusterInfo(
        storage.admin(),
        storage.database(),
        config.db,
        config.collection,
      ).finally(() => storage.close());

      const result = {
        status: "success",
        phase: "inspect",
        uri: sanitizeUri(config.uri),
        namespace: `${config.db}.${config.collection}`,
        clusterType,
        configuredTopology: config.clusterTopology,
        shardKey: router.shardKeyPattern(),
      };
      console.log(JSON.stringify(result, null, 2));
      process.exit(0);
    } catch (error) {
      exitWithError(error, "inspect");
    }
  });
}
