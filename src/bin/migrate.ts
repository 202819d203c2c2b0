#!/usr/bin/env tsx
import { hideBin } from "yargs/helpers";
import yargs from "yargs";
import { RedmineAdapter } from "../adapters/redmine/RedmineAdapter";
import { RedmineClient } from "../adapters/redmine/RedmineClient";
import { GiteaAdapter } from "../adapters/gitea/GiteaAdapter";
import { GiteaClient } from "../adapters/gitea/GiteaClient";
import { DryRunGiteaAdapter } from "../adapters/gitea/DryRunGiteaAdapter";
import { JsonFileRegistryStore } from "../adapters/registry/JsonFileRegistryStore";
import { JsonFileCheckpointStore } from "../adapters/registry/JsonFileCheckpointStore";
import { IdentifierRegistry } from "../domain/services/IdentifierRegistry";
import { IssueMigrationService } from "../domain/services/MigrationService";
import { MigrationCheckpoint } from "../domain/services/MigrationCheckpoint";
import type { GiteaPort } from "../domain/ports/GiteaPort";
import { loadConfig } from "../config";

const argv = yargs(hideBin(process.argv))
  .option("dry-run", {
    alias: "dryRun",
    type: "boolean",
    default: false,
    describe: "Simulate migration without writing to Gitea",
  })
  .option("issues", {
    type: "array",
    number: true,
    describe:
      "Specific Redmine issue IDs to migrate. If omitted, migrates the whole project.",
  })
  .option("registry", {
    type: "string",
    describe: "Path of the ID map file (overrides REGISTRY_PATH)",
  })
  .help()
  .parseSync();

async function main() {
  const config = loadConfig();
  const { mapping, migration } = config;

  const redmine = new RedmineAdapter(new RedmineClient(config.redmine));

  const registryPath = argv.dryRun
    ? `${argv.registry ?? migration.registryPath}.dry-run`
    : argv.registry ?? migration.registryPath;
  const registryStore = new JsonFileRegistryStore(registryPath);
  const registry = new IdentifierRegistry(registryStore);
  const checkpoint = new MigrationCheckpoint(
    JsonFileCheckpointStore.besideRegistry(registryPath)
  );

  let gitea: GiteaPort;
  if (argv.dryRun) {
    const earlier = (await registryStore.read()) ?? [];
    gitea = new DryRunGiteaAdapter(
      `${config.gitea.owner}/${config.gitea.repo}`,
      [
        ...Object.values(mapping.issueTypeMap),
        ...Object.values(mapping.priorityLabelMap),
        mapping.rejectedLabel,
      ],
      Math.max(0, ...earlier.map(([, target]) => target)) + 1
    );
  } else {
    gitea = new GiteaAdapter(new GiteaClient(config.gitea));
  }

  // Explicit entries win over logins read from the Redmine user directory.
  const userMap = { ...(await redmine.getUserMap()), ...mapping.userMap };

  const migrator = new IssueMigrationService(
    redmine,
    gitea,
    registry,
    checkpoint,
    {
      ...mapping,
      ...migration,
      userMap,
      redmineBaseUrl: config.redmine.baseUrl,
    }
  );

  const controller = new AbortController();
  process.once("SIGINT", () => controller.abort(new Error("interrupted")));
  if (migration.timeoutMs) {
    const ms = migration.timeoutMs;
    setTimeout(
      () => controller.abort(new Error(`timed out after ${ms} ms`)),
      ms
    ).unref();
  }

  const only = (argv.issues ?? []).map(Number).filter(Number.isInteger);
  const { results, rewrite } = await migrator.migrate({
    only,
    signal: controller.signal,
  });

  const count = (state: string) =>
    results.filter((r) => r.state === state).length;
  console.log(
    `> Migrated ${count("journalApplied")}, skipped ${count("skipped")}, already done ${count("resumed")}; ${rewrite.updated} texts rewritten`
  );
  if (rewrite.unresolved.length > 0) {
    console.warn(`> ${rewrite.unresolved.length} unresolved references:`);
    for (const u of rewrite.unresolved) {
      const where =
        u.location.commentId === undefined
          ? `#${u.location.issueNumber}`
          : `#${u.location.issueNumber} (comment ${u.location.commentId})`;
      console.warn(`  ${u.token} in ${where}`);
    }
  }
  console.log(`> ID map written to ${registryPath}`);
}

main().catch((err) => {
  console.error(err);
  process.exit(1);
});
