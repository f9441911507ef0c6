import "dotenv/config";
import { loadConfig } from "../config.js";
import { SqliteStore } from "../store/sqlite.js";

const { dbPath } = loadConfig();
const store = new SqliteStore(dbPath);

store.init().then(() => store.close()).then(() => {
  console.log("ok: db initialized", dbPath);
}).catch((e) => {
  console.error("db init failed", e);
  process.exit(1);
});
