// src/bootstrap/dependency-manifest.ts
// Startup preflight: every runtime dependency declared in package.json must be installed.

import fs from "fs";
import path from "path";
import { z } from "zod";
import {
  ManifestReadError,
  MissingDependencyError,
} from "@/lib/errors/startup.errors";

const ManifestSchema = z.object({
  name: z.string().optional(),
  version: z.string().optional(),
  dependencies: z.record(z.string()).default({}),
});

export type DependencyManifest = z.infer<typeof ManifestSchema>;

export type InstalledCheck = (packageName: string) => boolean;

export function readDependencyManifest(manifestPath: string): DependencyManifest {
  let raw: string;
  try {
    raw = fs.readFileSync(manifestPath, "utf8");
  } catch (err) {
    throw new ManifestReadError(
      manifestPath,
      err instanceof Error ? err.message : String(err),
    );
  }

  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch (err) {
    throw new ManifestReadError(
      manifestPath,
      `invalid JSON (${err instanceof Error ? err.message : String(err)})`,
    );
  }

  const parsed = ManifestSchema.safeParse(json);
  if (!parsed.success) {
    throw new ManifestReadError(
      manifestPath,
      parsed.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`).join("; "),
    );
  }
  return parsed.data;
}

/**
 * Package is installed when `node_modules/<name>/package.json` exists next to
 * the manifest. Scoped names resolve to nested directories.
 */
export function nodeModulesCheck(manifestPath: string): InstalledCheck {
  const root = path.join(path.dirname(manifestPath), "node_modules");
  return (packageName) =>
    fs.existsSync(path.join(root, ...packageName.split("/"), "package.json"));
}

export function findMissingDependencies(
  manifest: DependencyManifest,
  isInstalled: InstalledCheck,
): string[] {
  return Object.keys(manifest.dependencies).filter((name) => !isInstalled(name));
}

export function verifyDependencyManifest(opts: {
  manifestPath: string;
  isInstalled?: InstalledCheck;
}): DependencyManifest {
  const manifest = readDependencyManifest(opts.manifestPath);
  const isInstalled = opts.isInstalled ?? nodeModulesCheck(opts.manifestPath);

  const missing = findMissingDependencies(manifest, isInstalled);
  if (missing.length > 0) {
    throw new MissingDependencyError(missing);
  }
  return manifest;
}
