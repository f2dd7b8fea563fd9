import fs from "node:fs";
import path from "node:path";

const LICENSE_FILES = ["LICENSE", "LICENSE.txt", "LICENSE.md", "LICENCE", "LICENCE.txt", "LICENCE.md"];

/** Every phrase must appear (case-insensitively) for the license to match. First match wins. */
const LICENSE_PHRASES: Array<[string, string[]]> = [
  ["MIT", ["Permission is hereby granted, free of charge", "MIT License"]],
  ["Apache-2.0", ["Apache License", "Version 2.0"]],
  ["GPL-3.0", ["GNU GENERAL PUBLIC LICENSE", "Version 3"]],
  ["GPL-2.0", ["GNU GENERAL PUBLIC LICENSE", "Version 2"]],
  ["BSD-3-Clause", ["Redistribution and use", "neither the name"]],
  ["BSD-2-Clause", ["Redistribution and use", "without specific prior written permission"]],
  ["ISC", ["Permission to use, copy, modify", "ISC"]],
  ["Unlicense", ["This is free and unencumbered software"]],
];

const PREVIEW_EXTENSIONS = [".png", ".jpg", ".jpeg", ".gif", ".webp"];

/**
 * Identify the license in the package root's LICENSE file. Returns "Custom" for
 * an unrecognised text and null when there is no readable license file.
 */
export function detectLicense(packageDir: string): string | null {
  for (const filename of LICENSE_FILES) {
    const licensePath = path.join(packageDir, filename);
    if (!fs.existsSync(licensePath)) continue;
    let content: string;
    try {
      content = fs.readFileSync(licensePath, "utf8").toLowerCase();
    } catch {
      return null;
    }
    for (const [license, phrases] of LICENSE_PHRASES) {
      if (phrases.every((p) => content.includes(p.toLowerCase()))) return license;
    }
    return "Custom";
  }
  return null;
}

/** Raw-content URL of a `preview.<ext>` image, served from the `main` branch of the GitHub repo. */
export function detectPreview(packageDir: string, github: string): string {
  for (const ext of PREVIEW_EXTENSIONS) {
    if (!fs.existsSync(path.join(packageDir, `preview${ext}`))) continue;
    if (!github) return "";
    return `${github.replace("github.com", "raw.githubusercontent.com").replace(/\/+$/, "")}/main/preview${ext}`;
  }
  return "";
}
