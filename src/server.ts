// src/server.ts
// Process entrypoint: one listener per process, exit 1 on any startup failure.

import { loadDotenv } from "@/config/app.config";
import { runProcess } from "@/bootstrap/entrypoint";

loadDotenv();

void runProcess();
