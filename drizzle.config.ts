import { defineConfig } from "drizzle-kit";
import { config } from "dotenv";

config({ path: ".env.local" });
config({ path: ".env" });

export default defineConfig({
  schema: "./src/db/workflows-schema/index.ts",
  out: "./drizzle-workflows",
  dialect: "postgresql",
  dbCredentials: {
    host: process.env.DB_HOST ?? "localhost",
    port: parseInt(process.env.DB_PORT || '5432'),
    user: process.env.DB_USER ?? "postgres",
    password: process.env.DB_PASSWORD ?? "",
    database: process.env.WORKFLOWS_DB ?? "picture_book_workflows",
    ssl: false,
  },
  migrations: {
    table: 'drizzle_migrations',
    schema: 'public',
  },
});
