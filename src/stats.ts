/**
 * Host statistics for /stats.
 *
 * Disk usage comes from statfs on the data directory, memory and CPU from
 * node:os, network counters from /proc/net/dev. Anything a platform cannot
 * provide is reported as null and rendered as "unavailable".
 */

import fs from "node:fs/promises";
import os from "node:os";
import { escapeHtml, formatBytes, formatDuration } from "./format.js";

/** CPU usage is measured over this window, like a short `top` sample. */
const CPU_SAMPLE_MS = 500;

export interface DiskUsage {
  total: number;
  used: number;
  free: number;
}

export interface NetworkTotals {
  sent: number;
  received: number;
}

export interface StatsSnapshot {
  uptimeSeconds: number;
  disk: DiskUsage | null;
  /** 0-100, one decimal. */
  memoryPercent: number;
  /** 0-100, one decimal; null when no CPU time elapsed during the sample. */
  cpuPercent: number | null;
  network: NetworkTotals | null;
}

export interface CollectStatsOptions {
  /** Directory whose filesystem is reported. */
  dataDir: string;
  /** Process start, in milliseconds. */
  startedAt: number;
  now?: () => number;
  sampleMs?: number;
}

interface CpuTimes {
  idle: number;
  total: number;
}

function round1(value: number): number {
  return Math.round(value * 10) / 10;
}

function readCpuTimes(): CpuTimes {
  let idle = 0;
  let total = 0;
  for (const cpu of os.cpus()) {
    const { user, nice, sys, idle: idleTime, irq } = cpu.times;
    idle += idleTime;
    total += user + nice + sys + idleTime + irq;
  }
  return { idle, total };
}

/**
 * Busy share of the CPU time that elapsed between two samples.
 */
export function cpuPercentBetween(before: CpuTimes, after: CpuTimes): number | null {
  const total = after.total - before.total;
  if (total <= 0) return null;
  const idle = after.idle - before.idle;
  return round1(Math.min(100, Math.max(0, (1 - idle / total) * 100)));
}

async function sampleCpuPercent(sampleMs: number): Promise<number | null> {
  const before = readCpuTimes();
  await new Promise((resolve) => setTimeout(resolve, sampleMs));
  return cpuPercentBetween(before, readCpuTimes());
}

export function memoryPercent(total: number, free: number): number {
  if (total <= 0) return 0;
  return round1(((total - free) / total) * 100);
}

async function diskUsage(dir: string): Promise<DiskUsage | null> {
  try {
    const stats = await fs.statfs(dir);
    const total = stats.blocks * stats.bsize;
    const free = stats.bavail * stats.bsize;
    const used = total - stats.bfree * stats.bsize;
    return { total, used, free };
  } catch (err) {
    console.warn("[stats] statfs failed:", (err as Error).message);
    return null;
  }
}

/**
 * Sum received/transmitted bytes over every non-loopback interface in the
 * contents of /proc/net/dev.
 */
export function parseNetDev(contents: string): NetworkTotals {
  let sent = 0;
  let received = 0;
  for (const line of contents.split("\n")) {
    const colon = line.indexOf(":");
    if (colon === -1) continue;
    const iface = line.slice(0, colon).trim();
    if (!iface || iface === "lo") continue;
    const fields = line.slice(colon + 1).trim().split(/\s+/).map(Number);
    // Receive: bytes packets errs drop fifo frame compressed multicast,
    // then transmit starts at index 8 with bytes.
    if (fields.length < 9) continue;
    received += Number.isFinite(fields[0]) ? fields[0] : 0;
    sent += Number.isFinite(fields[8]) ? fields[8] : 0;
  }
  return { sent, received };
}

async function networkTotals(): Promise<NetworkTotals | null> {
  if (process.platform !== "linux") return null;
  try {
    return parseNetDev(await fs.readFile("/proc/net/dev", "utf-8"));
  } catch (err) {
    console.warn("[stats] Could not read /proc/net/dev:", (err as Error).message);
    return null;
  }
}

export async function collectStats(options: CollectStatsOptions): Promise<StatsSnapshot> {
  const now = options.now ?? Date.now;
  const [disk, cpuPercent, network] = await Promise.all([
    diskUsage(options.dataDir),
    sampleCpuPercent(options.sampleMs ?? CPU_SAMPLE_MS),
    networkTotals(),
  ]);
  return {
    uptimeSeconds: Math.max(0, (now() - options.startedAt) / 1000),
    disk,
    memoryPercent: memoryPercent(os.totalmem(), os.freemem()),
    cpuPercent,
    network,
  };
}

function code(value: string): string {
  return `<code>${escapeHtml(value)}</code>`;
}

export function formatStats(stats: StatsSnapshot): string {
  const disk = stats.disk
    ? `${code(formatBytes(stats.disk.total))} total, ${code(formatBytes(stats.disk.used))} used, ${code(formatBytes(stats.disk.free))} free`
    : "unavailable";
  const cpu = stats.cpuPercent === null ? "unavailable" : code(`${stats.cpuPercent}%`);
  const network = stats.network
    ? `↑ ${code(formatBytes(stats.network.sent))} ↓ ${code(formatBytes(stats.network.received))}`
    : "unavailable";

  return (
    "<b>Bot Status</b>\n\n" +
    `➜ Uptime: ${code(formatDuration(stats.uptimeSeconds))}\n` +
    `➜ Disk: ${disk}\n` +
    `➜ Memory: ${code(`${stats.memoryPercent}%`)}\n` +
    `➜ CPU: ${cpu}\n` +
    `➜ Network: ${network}`
  );
}
