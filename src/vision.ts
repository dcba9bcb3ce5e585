/**
 * Screenshot comparison and vision-model assisted locator suggestions.
 *
 * Images are decoded to raw sRGB with sharp. When the two screenshots differ in
 * size the current one is resized to the baseline with a nearest-neighbour
 * kernel, so small anti-aliasing changes can show up as differences.
 */

import crypto from "node:crypto";
import fs from "node:fs/promises";
import path from "node:path";
import sharp from "sharp";
import { healLog, errorMessage } from "./logger";
import type { VisionCapability } from "./providers";
import { JsonFileStore, type KeyValueStore } from "./store";
import {
  FRAMEWORK_DISPLAY_NAMES,
  VisionAnalysis,
  type Anomaly,
  type Framework,
  type Region,
  type Severity,
  type VisualDiffResult,
} from "./types";
import { round } from "./utils";

const CHANNELS = 3;
const ANALYSIS_CONFIDENCE = 0.85;
const DIFF_AMPLIFICATION = 5;

const ELEMENT_KEYWORDS = ["button", "input", "link", "text", "image", "form", "menu", "nav"] as const;

export const DEFAULT_ANALYSIS_PROMPT = `Analyze this screenshot and describe any UI changes or visual differences.
Focus on:
- Elements that moved or changed position
- Elements that changed size or style
- Elements that appeared or disappeared
- Any other significant visual changes

Return your analysis in a structured format.`;

export function severityFor(diffPercentage: number): Severity {
  if (diffPercentage > 20) return "critical";
  if (diffPercentage > 10) return "high";
  if (diffPercentage > 5) return "medium";
  return "low";
}

function suggestedActionFor(answer: string): VisionAnalysis["suggestedAction"] {
  const lower = answer.toLowerCase();
  if (lower.includes("update locator")) return "update_locator";
  if (lower.includes("no action") || lower.includes("no change")) return "no_action_needed";
  return "manual_review";
}

function elementsIn(answer: string): string[] {
  const lower = answer.toLowerCase();
  return ELEMENT_KEYWORDS.filter((k) => lower.includes(k));
}

interface RawImage {
  data: Buffer;
  width: number;
  height: number;
}

async function dimensions(file: string): Promise<{ width: number; height: number }> {
  const { width, height } = await sharp(file).metadata();
  if (!width || !height) throw new Error(`cannot read image dimensions of ${file}`);
  return { width, height };
}

async function decodeRgb(file: string, size?: { width: number; height: number }): Promise<RawImage> {
  let pipeline = sharp(file).removeAlpha().toColourspace("srgb");
  if (size) {
    pipeline = pipeline.resize(size.width, size.height, { fit: "fill", kernel: "nearest" });
  }
  const { data, info } = await pipeline.raw().toBuffer({ resolveWithObject: true });
  if (info.channels !== CHANNELS) {
    throw new Error(`expected ${CHANNELS} colour channels in ${file}, got ${info.channels}`);
  }
  return { data, width: info.width, height: info.height };
}

/**
 * Single bounding box over every pixel whose mean channel difference exceeds
 * `pixelThreshold`. Disjoint changes collapse into one rectangle. Bounds are inclusive.
 */
export function regionsOf(
  diff: Uint8Array,
  width: number,
  height: number,
  severity: Severity,
  pixelThreshold = 30
): Region[] {
  let minX = width;
  let minY = height;
  let maxX = -1;
  let maxY = -1;

  for (let y = 0; y < height; y++) {
    for (let x = 0; x < width; x++) {
      const i = (y * width + x) * CHANNELS;
      const gray = (diff[i] + diff[i + 1] + diff[i + 2]) / CHANNELS;
      if (gray <= pixelThreshold) continue;
      if (x < minX) minX = x;
      if (x > maxX) maxX = x;
      if (y < minY) minY = y;
      if (y > maxY) maxY = y;
    }
  }

  if (maxX < 0) return [];
  return [{ x: minX, y: minY, width: maxX - minX + 1, height: maxY - minY + 1, severity }];
}

export interface CompareOptions {
  saveDiff?: boolean;
}

export interface VisualDiffEngineOptions {
  /** Holds `vision_cache.json` and the diff maps */
  cacheDir: string;
  vision?: VisionCapability;
  /** Replaces the on-disk analysis cache, mainly for tests */
  store?: KeyValueStore<VisionAnalysis>;
}

export class VisualDiffEngine {
  readonly cacheDir: string;
  readonly cacheFile: string;
  private readonly vision?: VisionCapability;
  private readonly analyses: KeyValueStore<VisionAnalysis>;

  constructor(opts: VisualDiffEngineOptions) {
    this.cacheDir = opts.cacheDir;
    this.cacheFile = path.join(opts.cacheDir, "vision_cache.json");
    this.vision = opts.vision;
    this.analyses = opts.store ?? new JsonFileStore(this.cacheFile, VisionAnalysis);
  }

  async compare(baselineImage: string, currentImage: string, opts: CompareOptions = {}): Promise<VisualDiffResult> {
    const baselineSize = await dimensions(baselineImage);
    const currentSize = await dimensions(currentImage);
    const resize = currentSize.width !== baselineSize.width || currentSize.height !== baselineSize.height;

    const baseline = await decodeRgb(baselineImage);
    const current = await decodeRgb(currentImage, resize ? baselineSize : undefined);

    const diff = new Uint8Array(baseline.data.length);
    let diffPixelCount = 0;
    for (let i = 0; i < diff.length; i++) {
      const d = Math.abs(baseline.data[i] - current.data[i]);
      diff[i] = d;
      if (d !== 0) diffPixelCount++;
    }

    const totalPixels = baseline.width * baseline.height;
    const percentage = (diffPixelCount / (totalPixels * CHANNELS)) * 100;
    const diffPercentage = round(percentage, 2);
    const severity = severityFor(diffPercentage);

    let diffMapPath: string | undefined;
    if (opts.saveDiff ?? true) {
      diffMapPath = await this.saveDiffMap(diff, baseline.width, baseline.height);
    }

    return {
      similarity: round(1 - percentage / 100, 4),
      diffPixelCount,
      diffPercentage,
      changedRegions: regionsOf(diff, baseline.width, baseline.height, severity),
      diffMapPath,
      baselineSize,
      currentSize,
      timestamp: new Date().toISOString(),
    };
  }

  private async saveDiffMap(diff: Uint8Array, width: number, height: number): Promise<string> {
    const amplified = Buffer.alloc(diff.length);
    for (let i = 0; i < diff.length; i++) {
      amplified[i] = Math.min(255, diff[i] * DIFF_AMPLIFICATION);
    }
    await fs.mkdir(this.cacheDir, { recursive: true });
    const stamp = new Date().toISOString().replace(/[:.]/g, "-");
    const file = path.join(this.cacheDir, `diff_${stamp}_${crypto.randomUUID().slice(0, 8)}.png`);
    await sharp(amplified, { raw: { width, height, channels: CHANNELS } }).png().toFile(file);
    return file;
  }

  /** Empty when the screenshots are at least `threshold` similar */
  async detectAnomalies(baselineImage: string, currentImage: string, threshold = 0.8): Promise<Anomaly[]> {
    const diff = await this.compare(baselineImage, currentImage, { saveDiff: true });
    if (diff.similarity >= threshold) return [];

    const severity = severityFor(diff.diffPercentage);
    return diff.changedRegions.map((region) => ({
      region,
      severity,
      description: `Visual difference detected: ${diff.diffPercentage.toFixed(1)}% pixels changed`,
      confidence: round(1 - diff.similarity, 2),
      diffMapPath: diff.diffMapPath,
      timestamp: diff.timestamp,
    }));
  }

  static cacheKey(imagePath: string, prompt: string): string {
    return crypto.createHash("md5").update(`${imagePath}|${prompt}`).digest("hex");
  }

  /**
   * Ask the vision model about one image. Successful answers are cached by image
   * path and prompt; failures come back with `error` set and are not cached.
   */
  async analyzeWithLLM(imagePath: string, prompt = ""): Promise<VisionAnalysis> {
    const key = VisualDiffEngine.cacheKey(imagePath, prompt);
    const cached = await this.analyses.get(key);
    if (cached) return cached;

    const question = prompt || DEFAULT_ANALYSIS_PROMPT;
    const failed = (error: string): VisionAnalysis => ({
      description: "Failed to analyze image with vision model",
      elementsAffected: [],
      suggestedAction: "manual_review",
      confidence: 0,
      timestamp: new Date().toISOString(),
      prompt: question,
      imagePath,
      error,
    });

    if (!this.vision) return failed("vision model not configured");

    let answer: string;
    try {
      answer = await this.vision.askVision([imagePath], question);
    } catch (err) {
      healLog.strategyError("vision", errorMessage(err));
      return failed(errorMessage(err));
    }

    const analysis: VisionAnalysis = {
      description: answer.trim(),
      elementsAffected: elementsIn(answer),
      suggestedAction: suggestedActionFor(answer),
      confidence: ANALYSIS_CONFIDENCE,
      timestamp: new Date().toISOString(),
      prompt: question,
      imagePath,
    };
    await this.analyses.set(key, analysis);
    return analysis;
  }

  /**
   * Locator for the element behind the first anomaly. A text locator when the
   * model's answer mentions one, otherwise a button locator built from `contextHint`.
   */
  async suggestLocator(anomalies: Anomaly[], contextHint: string, framework: Framework): Promise<string | null> {
    const diffMapPath = anomalies[0]?.diffMapPath;
    if (!diffMapPath || !(await exists(diffMapPath))) return null;

    const prompt = [
      `Based on this visual diff, suggest a locator for: "${contextHint}"`,
      "",
      "The element appears to have changed position or appearance.",
      `Framework: ${FRAMEWORK_DISPLAY_NAMES[framework]}`,
      "",
      "Suggest a robust locator strategy (CSS, XPath, or text-based) that would work with the changed element.",
    ].join("\n");

    const { description } = await this.analyzeWithLLM(diffMapPath, prompt);
    if (description.includes("text=") || description.includes("text:")) {
      return `text=${contextHint}`;
    }
    if (!contextHint) return null;

    switch (framework) {
      case "playwright":
        return `role=button[name='${contextHint}']`;
      case "selenium":
        return `//button[contains(text(), '${contextHint}')]`;
    }
  }

  async clearCache(): Promise<void> {
    await this.analyses.clear();
    healLog.cacheCleared("vision cache");
  }

  async cacheStats(): Promise<{ size: number; cacheFile: string }> {
    return { size: await this.analyses.size(), cacheFile: this.cacheFile };
  }
}

async function exists(file: string): Promise<boolean> {
  try {
    await fs.access(file);
    return true;
  } catch {
    return false;
  }
}
