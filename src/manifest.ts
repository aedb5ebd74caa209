// ============================================================================
// FILE: src/manifest.ts
// PURPOSE: Scrape dependency coordinates from common build manifests
// ============================================================================

import * as fs from 'fs/promises';
import * as path from 'path';
import { type DependencyMap, isRecord } from './types.js';

const GRADLE_DEPENDENCY = /(implementation|api|compileOnly|runtimeOnly)\s+["']([^"']+)["']/g;

export function emptyDependencies(): DependencyMap {
  return { maven: [], gradle: [], npm: [], pip: [] };
}

/**
 * readOptional - Read a manifest, or null when it is absent or unreadable
 */
async function readOptional(filePath: string): Promise<string | null> {
  try {
    return await fs.readFile(filePath, 'utf-8');
  } catch {
    return null;
  }
}

function xmlText(block: string, tag: string): string {
  const match = block.match(new RegExp(`<${tag}>\\s*([^<]*?)\\s*</${tag}>`));
  return match ? match[1] : '';
}

/**
 * parsePom - "groupId:artifactId" for every <dependency> naming both
 */
export function parsePom(xml: string): string[] {
  const deps: string[] = [];
  for (const match of xml.matchAll(/<dependency>([\s\S]*?)<\/dependency>/g)) {
    const group = xmlText(match[1], 'groupId');
    const artifact = xmlText(match[1], 'artifactId');
    if (group && artifact) deps.push(`${group}:${artifact}`);
  }
  return deps;
}

export function parseGradle(text: string): string[] {
  return Array.from(text.matchAll(GRADLE_DEPENDENCY), m => m[2]);
}

/**
 * parsePackageJson - "name@range" for dependencies, then devDependencies
 *
 * Invalid JSON yields an empty list.
 */
export function parsePackageJson(text: string): string[] {
  let data: unknown;
  try {
    data = JSON.parse(text);
  } catch {
    return [];
  }
  if (!isRecord(data)) return [];

  const deps: string[] = [];
  for (const section of ['dependencies', 'devDependencies']) {
    const entries = data[section];
    if (!isRecord(entries)) continue;
    for (const [name, range] of Object.entries(entries)) {
      deps.push(`${name}@${String(range)}`);
    }
  }
  return deps;
}

export function parseRequirements(text: string): string[] {
  return text
    .split(/\r?\n/)
    .map(line => line.trim())
    .filter(line => line && !line.startsWith('#'));
}

/**
 * extractManifestDependencies - Collect dependencies found at the repo root
 *
 * Looks at pom.xml, build.gradle, package.json and requirements.txt.
 * Missing or unreadable manifests leave their list empty.
 */
export async function extractManifestDependencies(root: string): Promise<DependencyMap> {
  const deps = emptyDependencies();

  const pom = await readOptional(path.join(root, 'pom.xml'));
  if (pom !== null) deps.maven = parsePom(pom);

  const gradle = await readOptional(path.join(root, 'build.gradle'));
  if (gradle !== null) deps.gradle = parseGradle(gradle);

  const pkg = await readOptional(path.join(root, 'package.json'));
  if (pkg !== null) deps.npm = parsePackageJson(pkg);

  const req = await readOptional(path.join(root, 'requirements.txt'));
  if (req !== null) deps.pip = parseRequirements(req);

  return deps;
}
