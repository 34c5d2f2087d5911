/**
 * Timeline bookkeeping shared by the generator and the renderer.
 *
 * The generator keeps its cursors as integer sample counts and only converts
 * to seconds when it emits a segment; the renderer converts back with the
 * same rounding so adjacent segments meet on the same sample.
 */

/** Round half up. Both stages use this for every time to sample conversion. */
export function roundHalfUp(value: number): number {
  return Math.floor(value + 0.5);
}

export function secondsToSamples(seconds: number, sampleRate: number): number {
  return roundHalfUp(seconds * sampleRate);
}

export function samplesToSeconds(samples: number, sampleRate: number): number {
  return samples / sampleRate;
}

/** Anything with a half-open [start, end) placement on a channel. */
export interface ChannelSpan {
  start: number;
  end: number;
  channel: number;
}

export interface ChannelOverlap {
  channel: number;
  first: number;
  second: number;
  /** Overlapping time in the units of the spans. */
  amount: number;
}

/**
 * Find pairs of spans on the same channel whose ranges intersect.
 * Indices refer to positions in the input list.
 */
export function findChannelOverlaps(spans: readonly ChannelSpan[]): ChannelOverlap[] {
  const byChannel = new Map<number, number[]>();
  spans.forEach((span, index) => {
    const list = byChannel.get(span.channel);
    if (list) {
      list.push(index);
    } else {
      byChannel.set(span.channel, [index]);
    }
  });

  const overlaps: ChannelOverlap[] = [];
  for (const [channel, indices] of byChannel) {
    const sorted = [...indices].sort((a, b) => spans[a].start - spans[b].start || spans[a].end - spans[b].end);
    // Furthest-reaching span seen so far; a later span starting before its
    // end overlaps it
    let reach = -1;
    for (const index of sorted) {
      if (reach >= 0 && spans[index].start < spans[reach].end) {
        overlaps.push({
          channel,
          first: reach,
          second: index,
          amount: Math.min(spans[reach].end, spans[index].end) - spans[index].start,
        });
      }
      if (reach < 0 || spans[index].end > spans[reach].end) {
        reach = index;
      }
    }
  }
  return overlaps;
}

/** Latest end over all spans, 0 for an empty list. */
export function sceneEnd(spans: readonly { end: number }[]): number {
  return spans.reduce((max, span) => Math.max(max, span.end), 0);
}

/**
 * Samples needed to hold `seconds`: ceil(seconds * rate), ignoring the float
 * noise left by a seconds value that came from an exact sample count.
 */
export function samplesToCover(seconds: number, sampleRate: number): number {
  const exact = seconds * sampleRate;
  const nearest = Math.round(exact);
  return Math.abs(exact - nearest) < 1e-6 ? nearest : Math.ceil(exact);
}
