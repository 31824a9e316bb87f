import 'dotenv/config';
import { readFile } from "node:fs/promises";
import path from "node:path";
import { z } from "zod";

import { insertZipAreaSchema } from "@shared/schema";
import { createDatabase } from "../server/db";
import logger from "../server/logger";
import { ZipAreaExistsError } from "../server/services/errors";
import { DatabaseStorage } from "../server/storage";

const zipAreaFixture = z.array(insertZipAreaSchema);

async function seedZipAreas(storage: DatabaseStorage) {
  const file = path.resolve(import.meta.dirname, "data/zip-areas.json");
  const areas = zipAreaFixture.parse(JSON.parse(await readFile(file, "utf8")));
  for (const area of areas) {
    try {
      await storage.createZipArea(area);
    } catch (err) {
      if (!(err instanceof ZipAreaExistsError)) throw err;
      logger.info({ zipCode: area.zipCode }, "ZIP area already present");
    }
  }
}

async function run() {
  const databaseUrl = process.env.DATABASE_URL;
  if (!databaseUrl) {
    throw new Error("DATABASE_URL must be set to seed");
  }
  const { pool, db } = createDatabase(databaseUrl);
  const storage = new DatabaseStorage(db);
  const seeds = [
    { name: "delivery settings", fn: () => storage.getOrCreateDeliverySettings() },
    { name: "ZIP areas", fn: () => seedZipAreas(storage) },
  ];

  let failed = false;

  for (const { name, fn } of seeds) {
    try {
      await fn();
      logger.info(`Seeded ${name}`);
    } catch (err) {
      failed = true;
      logger.error({ err }, `Failed to seed ${name}`);
    }
  }

  await pool.end();
  if (failed) {
    process.exit(1);
  }
}

run().catch((err) => {
  logger.error({ err }, "Unexpected error during seeding");
  process.exit(1);
});
