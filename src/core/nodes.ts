import type { DataPacket, LinkNode, SinkNode, SourceNode } from './types.js';
import { maxLevelForTier, tierForValue } from './tiers.js';

// ─── Shared upgrade curve ──────────────────────────────────────────────────

const UPGRADE_GROWTH = 1.18;

export function nodeUpgradeCost(baseCost: number, level: number): number {
  return baseCost * Math.pow(UPGRADE_GROWTH, level);
}

// ─── Source ────────────────────────────────────────────────────────────────

export function sourceProduction(source: SourceNode): number {
  return source.baseProduction * source.level * 1.5;
}

export function sourceTier(source: SourceNode): number {
  return tierForValue('source', source.baseProduction);
}

export function sourceUpgradeCost(source: SourceNode): number {
  return nodeUpgradeCost(25, source.level);
}

export function produce(source: SourceNode, tick: number): DataPacket {
  return { type: source.outputType, amount: sourceProduction(source), createdAtTick: tick };
}

// ─── Transport link ────────────────────────────────────────────────────────

export function linkBandwidth(link: LinkNode): number {
  return link.baseBandwidth * link.level * 1.4;
}

export function linkLatency(link: LinkNode): number {
  return Math.max(1, link.baseLatency - Math.floor(link.level / 3));
}

/**
 * Share of excess data that is lost outright. Never below 80%: overflow is
 * mostly discarded at every level, and whatever is neither transferred nor
 * counted as dropped vanishes too.
 */
export function linkLossFraction(link: LinkNode): number {
  return Math.max(0.8, 1 - 0.02 * link.level);
}

export function linkTier(link: LinkNode): number {
  return tierForValue('link', link.baseBandwidth);
}

export function linkUpgradeCost(link: LinkNode): number {
  return nodeUpgradeCost(30, link.level);
}

export interface TransferResult {
  link: LinkNode;
  transferred: number;
  dropped: number;
}

/**
 * Push `incoming` data through the link. Anything above
 * min(bandwidth, maxAcceptable) is excess; `lossFraction` of it is dropped.
 */
export function transfer(link: LinkNode, incoming: number, maxAcceptable: number): TransferResult {
  const effective = Math.max(0, Math.min(linkBandwidth(link), maxAcceptable));
  const amount = Math.max(0, incoming);
  const transferred = Math.min(amount, effective);
  const excess = amount - transferred;
  const dropped = excess * linkLossFraction(link);
  return {
    link: { ...link, lastTickTransferred: transferred, lastTickDropped: dropped },
    transferred,
    dropped,
  };
}

export function throughputEfficiency(link: LinkNode): number {
  const total = link.lastTickTransferred + link.lastTickDropped;
  return total > 0 ? link.lastTickTransferred / total : 1;
}

// ─── Sink ──────────────────────────────────────────────────────────────────

export function sinkCapacity(sink: SinkNode): number {
  return sink.baseProcessingRate * sink.level * 3;
}

export function sinkProcessingRate(sink: SinkNode): number {
  return sink.baseProcessingRate * sink.level * 1.3;
}

export function bufferRemaining(sink: SinkNode): number {
  return Math.max(0, sinkCapacity(sink) - sink.inputBuffer);
}

export function sinkLoad(sink: SinkNode): number {
  const cap = sinkCapacity(sink);
  return cap > 0 ? sink.inputBuffer / cap : 0;
}

export function sinkTier(sink: SinkNode): number {
  return tierForValue('sink', sink.conversionRate);
}

export function sinkUpgradeCost(sink: SinkNode): number {
  return nodeUpgradeCost(40, sink.level);
}

export function receiveData(sink: SinkNode, amount: number): { sink: SinkNode; accepted: number } {
  const accepted = Math.min(Math.max(0, amount), bufferRemaining(sink));
  return { sink: { ...sink, inputBuffer: sink.inputBuffer + accepted }, accepted };
}

/**
 * Convert buffered data into credits.
 * @param processingFactor 0–1 share of the processing rate available this tick
 */
export function processSink(sink: SinkNode, processingFactor = 1): { sink: SinkNode; processed: number; credits: number } {
  const factor = Math.min(1, Math.max(0, processingFactor));
  const processed = Math.min(sink.inputBuffer, sinkProcessingRate(sink) * factor);
  return {
    sink: { ...sink, inputBuffer: sink.inputBuffer - processed },
    processed,
    credits: processed * sink.conversionRate,
  };
}

// ─── Level caps ────────────────────────────────────────────────────────────

export function isAtMaxLevel(level: number, tier: number): boolean {
  return level >= maxLevelForTier(tier);
}
