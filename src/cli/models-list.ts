import { loadConfig } from "../config/env.js";
import { errorMessage } from "../core/errors.js";
import { describeSource, listProfiles, loadModelRegistry } from "../models/profile-registry.js";

async function main(): Promise<void> {
  const config = loadConfig();
  const registry = await loadModelRegistry(config.modelProfilesPath);

  process.stdout.write(`model config file: ${config.modelProfilesPath}\n\n`);

  process.stdout.write("servers:\n");
  for (const server of registry.servers) {
    process.stdout.write(`- ${server.id} [${server.provider}] baseUrl=${describeSource(server.baseUrl)}\n`);
  }

  process.stdout.write("\nmodels:\n");
  for (const model of registry.models) {
    const temperature = model.temperature === undefined ? "" : ` temperature=${model.temperature}`;
    process.stdout.write(`- ${model.id} server=${model.serverId} model=${describeSource(model.model)}${temperature}\n`);
  }

  process.stdout.write("\nprofiles:\n");
  for (const { id, value } of listProfiles(registry)) {
    const fields = [
      `model=${value.modelId}`,
      ...(value.preset ? [`preset=${value.preset}`] : []),
      ...(value.systemPrompt ? ["systemPrompt=custom"] : []),
      ...(value.maxHistory !== undefined ? [`maxHistory=${value.maxHistory}`] : []),
      ...(value.stream !== undefined ? [`stream=${value.stream}`] : []),
    ];
    process.stdout.write(`- ${id} ${fields.join(" ")}${value.description ? ` :: ${value.description}` : ""}\n`);
  }
}

main().catch((error) => {
  process.stderr.write(`fatal> ${errorMessage(error)}\n`);
  process.exit(1);
});
