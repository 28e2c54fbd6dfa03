import { defineConfig } from "drizzle-kit";
import { DB_PATH } from "./src/config/paths.js";

export default defineConfig({
  schema: "./src/site-db/schema.ts",
  out: "./drizzle",
  dialect: "sqlite",
  dbCredentials: {
    url: DB_PATH,
  },
});
