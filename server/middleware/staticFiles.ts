/**
 * Static frontend with a deny list: nothing under the data directory and no database files.
 */

import express, { type Express } from "express";
import { basename, extname, isAbsolute, join, posix, relative, resolve } from "path";

export const DATABASE_FILE_EXTENSIONS: readonly string[] = [".db", ".sqlite", ".sqlite3"];

export interface StaticOptions {
  publicDir: string;
  dataDir: string;
}

export function isDeniedPath(urlPath: string, { publicDir, dataDir }: StaticOptions): boolean {
  let decoded: string;
  try {
    decoded = decodeURIComponent(urlPath);
  } catch {
    return true;
  }
  const normalized = posix.normalize(`/${decoded}`);
  const target = resolve(publicDir, `.${normalized}`);
  const rel = relative(resolve(dataDir), target);
  if (rel === "" || (!rel.startsWith("..") && !isAbsolute(rel))) return true;
  const segments = normalized.split("/").filter(Boolean);
  if (segments.includes(basename(resolve(dataDir)))) return true;
  return DATABASE_FILE_EXTENSIONS.includes(extname(normalized).toLowerCase());
}

export function registerStaticRoutes(app: Express, options: StaticOptions): void {
  const publicDir = resolve(options.publicDir);

  app.use((req, res, next) => {
    if (req.method !== "GET" && req.method !== "HEAD") return next();
    if (req.path.startsWith("/api/")) return next();
    if (isDeniedPath(req.path, options)) {
      res.status(403).json({ error: "Forbidden" });
      return;
    }
    next();
  });

  app.get("/", (_req, res) => {
    res.sendFile(join(publicDir, "index.html"));
  });
  app.use(express.static(publicDir, { index: false }));
}
