import type { GatewayConfig } from "./config";

export type ModelsList = { object: "list"; data: Array<{ id: string; object: "model"; created: number; owned_by: string }> };

export function openaiModelsList(config: GatewayConfig): ModelsList {
  const seen = new Set<string>();
  const data: ModelsList["data"] = [];
  for (const id of config.supportedModels) {
    if (seen.has(id)) continue;
    seen.add(id);
    data.push({ id, object: "model", created: 0, owned_by: "copilot" });
  }
  return { object: "list", data };
}
