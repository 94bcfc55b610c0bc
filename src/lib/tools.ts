import * as fs from "fs";
import * as path from "path";
import type { ToolNotFound, ToolPaths } from "../contracts";

type Env = Record<string, string | undefined>;

const TOOLS: Array<{ name: keyof ToolPaths; envKey: string }> = [
  { name: "ffprobe", envKey: "FFPROBE_PATH" },
  { name: "ffmpeg", envKey: "FFMPEG_PATH" },
];

function isExecutableFile(candidate: string): boolean {
  try {
    const stat = fs.statSync(candidate);
    if (!stat.isFile()) return false;
    if (process.platform === "win32") return true;
    fs.accessSync(candidate, fs.constants.X_OK);
    return true;
  } catch {
    return false;
  }
}

/**
 * Resolve an executable name (or explicit path) the way a shell would.
 * Returns null when nothing executable is found.
 */
export function resolveExecutable(binary: string, env: Env): string | null {
  const extensions =
    process.platform === "win32"
      ? ["", ...(env.PATHEXT ?? ".EXE;.CMD;.BAT;.COM").split(";")]
      : [""];

  if (binary.includes("/") || binary.includes("\\")) {
    for (const ext of extensions) {
      const candidate = path.resolve(binary + ext);
      if (isExecutableFile(candidate)) return candidate;
    }
    return null;
  }

  const dirs = (env.PATH ?? "").split(path.delimiter).filter((d) => d.length > 0);
  for (const dir of dirs) {
    for (const ext of extensions) {
      const candidate = path.join(dir, binary + ext);
      if (isExecutableFile(candidate)) return candidate;
    }
  }
  return null;
}

/**
 * Locate ffprobe and ffmpeg before any per-video work begins.
 * FFPROBE_PATH / FFMPEG_PATH take precedence over PATH lookup.
 */
export function locateTools(
  env: Env
): { ok: true; tools: ToolPaths } | { ok: false; error: ToolNotFound } {
  const found: Partial<ToolPaths> = {};
  const missing: string[] = [];

  for (const tool of TOOLS) {
    const explicit = env[tool.envKey]?.trim();
    const resolved = resolveExecutable(explicit || tool.name, env);
    if (resolved) {
      found[tool.name] = resolved;
    } else {
      missing.push(explicit ? `${tool.name} (${tool.envKey}=${explicit})` : tool.name);
    }
  }

  if (found.ffprobe && found.ffmpeg) {
    return { ok: true, tools: { ffprobe: found.ffprobe, ffmpeg: found.ffmpeg } };
  }

  return {
    ok: false,
    error: {
      kind: "ToolNotFound",
      missing,
      message:
        `Command not found: ${missing.join(", ")}. ` +
        "Install FFmpeg and make sure ffmpeg and ffprobe are on your PATH.",
    },
  };
}
