import path from "node:path";
import { buildAppConfig } from "../config/app-config.js";
import { env } from "../config/env.js";
import { createKnowledgeBase } from "../lib/container.js";

const USAGE = `Usage: npm run kb -- <command> [args]

Commands:
  setup                                  Index every document in the knowledge directory
  ask <question>                         Answer a question from the knowledge base
  generate <contentType> <topic> <audience>
                                         Generate marketing content
  search <query>                         Show the most relevant chunks
  status                                 Show knowledge base status
  backup                                 Write a backup of the vector index
  import <file>                          Import a backup file`;

const print = (value: unknown) => {
  // eslint-disable-next-line no-console
  console.log(JSON.stringify(value, null, 2));
};

async function main() {
  const [command, ...args] = process.argv.slice(2);
  const kb = createKnowledgeBase(buildAppConfig(env));
  const { knowledge } = kb;

  let result: { status: string };
  switch (command) {
    case "setup":
      result = await knowledge.rebuild();
      break;
    case "ask":
      if (!args.length) throw new Error("ask needs a question");
      result = await knowledge.answer(args.join(" "));
      break;
    case "generate": {
      const [contentType, topic, ...audience] = args;
      if (!contentType || !topic || !audience.length) throw new Error("generate needs <contentType> <topic> <audience>");
      result = await knowledge.generateContent(contentType, topic, audience.join(" "));
      break;
    }
    case "search":
      if (!args.length) throw new Error("search needs a query");
      result = await knowledge.searchDocuments(args.join(" "));
      break;
    case "status":
      result = await knowledge.statusReport();
      break;
    case "backup":
      result = await knowledge.createBackup();
      break;
    case "import":
      if (!args[0]) throw new Error("import needs a backup file");
      result = await knowledge.importBackup(path.resolve(args[0]));
      break;
    default:
      // eslint-disable-next-line no-console
      console.log(USAGE);
      if (command) process.exitCode = 1;
      return;
  }

  print(result);
  if (result.status === "error") process.exitCode = 1;
}

main().catch((err: unknown) => {
  // eslint-disable-next-line no-console
  console.error("❌ kb command failed:", err instanceof Error ? err.message : err);
  process.exitCode = 1;
});
