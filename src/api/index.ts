import { loadConfig } from "../config.js";
import { createServices } from "../services/index.js";
import { createDatabase } from "../storage/index.js";
import { createApp } from "./app.js";

const config = loadConfig();
const db = createDatabase(config.databasePath);
const app = createApp(createServices(db, config.defaultCurrency), {
  currentUserId: config.currentUserId,
});

app.listen(config.port, () => {
  console.log(`🌐 Ledger API running on http://localhost:${config.port}`);
  console.log(`💾 Database: ${config.databasePath} (default currency ${config.defaultCurrency})`);
});
