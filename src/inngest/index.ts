import { serve } from "inngest/express";
import express from "express";
import { inngest } from "./client";
import { scanBatch } from "./functions/scan_batch";
import { loadConfig } from "../lib/config";
import * as dotenv from "dotenv";

dotenv.config();

const app = express();

app.use((req, _res, next) => {
  console.log(`${new Date().toISOString()} ${req.method} ${req.path}`);
  next();
});

app.use(express.json({ limit: process.env.EXPRESS_BODY_LIMIT || "1mb" }));

const functions = [scanBatch];
console.log(`Total functions to register: ${functions.length}`);

app.use(
  "/api/inngest",
  serve({
    client: inngest,
    functions,
  }),
);

const { port } = loadConfig();

app.listen(port, () => {
  console.log(`Inngest server running on http://localhost:${port}`);
  console.log(`Inngest endpoint: http://localhost:${port}/api/inngest`);
});
