import "dotenv/config";
import { createDb } from "../../db/db";
import { migrateOnce } from "../../db/migrate";
import { LibsqlMessageLog } from "../../adapters/repo/LibsqlMessageLog";
import { createMessageReport } from "../../core/messages/report";
import { DEFAULTS } from "../../config/defaults";
import { errorMessage } from "../../core/utils/errors";

// Reporte del log de mensajes; no requiere el token del bot
async function main(): Promise<void> {
  const db = createDb(process.env.MESSAGE_LOG_URL || DEFAULTS.MESSAGE_LOG_URL, process.env.MESSAGE_LOG_AUTH_TOKEN);
  try {
    await migrateOnce(db);
    const messages = await new LibsqlMessageLog(db).load();
    console.log(createMessageReport(messages));
  } finally {
    db.close();
  }
}

main().catch((e: unknown) => {
  console.error(`[report] Error: ${errorMessage(e)}`);
  process.exitCode = 1;
});
