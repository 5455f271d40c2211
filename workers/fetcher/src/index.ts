import "dotenv/config";
import { createClient } from "@supabase/supabase-js";
import { loadConfig } from "./config";
import { runCollection } from "./run";
import { createSupabaseStore } from "./store";

async function main(): Promise<number> {
  const config = loadConfig();

  const client = createClient(config.supabaseUrl, config.supabaseKey, {
    auth: {
      persistSession: false,
      autoRefreshToken: false,
    },
  });

  const outcome = await runCollection(config, { store: createSupabaseStore(client) });
  return outcome.ok ? 0 : 1;
}

main()
  .then((code) => {
    process.exitCode = code;
  })
  .catch((error: unknown) => {
    console.error("Collector run aborted", error);
    process.exitCode = 1;
  });
