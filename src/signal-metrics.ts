// Interview Voice Analyzer - Windowed signal metrics
// Pure DSP over mono float PCM: frame RMS in dB, F0 track, jitter,
// zero-crossing rate and voice register mix. Degenerate input never throws
// and never yields NaN; it resolves to zeros plus an insufficientData flag.

import type { SignalMetrics, VoiceRange, VoiceRegister } from "./types.js";

// ─── Options ────────────────────────────────────────────────────────────────────

export interface SignalMetricsOptions {
  /** Samples per RMS frame (centered, zero padded). */
  frameLength: number;
  hopLength: number;
  /** Frames quieter than peak - topDb are silent and never voiced. */
  topDb: number;
  fminHz: number;
  fmaxHz: number;
  pitchHopLength: number;
  /** Cumulative mean normalized difference threshold for a voiced period. */
  yinThreshold: number;
  minVoicedFramesForJitter: number;
  lowRegisterHz: number;
  highRegisterHz: number;
}

export const DEFAULT_SIGNAL_OPTIONS: SignalMetricsOptions = {
  frameLength: 1024,
  hopLength: 256,
  topDb: 40,
  fminHz: 65,
  fmaxHz: 2000,
  pitchHopLength: 512,
  yinThreshold: 0.15,
  minVoicedFramesForJitter: 10,
  lowRegisterHz: 150,
  highRegisterHz: 250,
};

/** Peak frame RMS below this is treated as digital silence. */
export const SILENCE_AMPLITUDE_FLOOR = 1e-5;

const DB_EPSILON = 1e-6;

// ─── Frame helpers ──────────────────────────────────────────────────────────────

export function amplitudeToDb(rms: number): number {
  return 20 * Math.log10(rms + DB_EPSILON);
}

/**
 * RMS per centered frame: frame i covers [i*hop - frame/2, i*hop + frame/2),
 * zero padded at both ends, giving 1 + floor(n / hop) frames.
 */
export function frameRms(samples: Float32Array, frameLength: number, hopLength: number): Float64Array {
  if (samples.length === 0) return new Float64Array(0);

  const frameCount = 1 + Math.floor(samples.length / hopLength);
  const half = Math.floor(frameLength / 2);
  const out = new Float64Array(frameCount);

  for (let i = 0; i < frameCount; i++) {
    const from = Math.max(0, i * hopLength - half);
    const to = Math.min(samples.length, i * hopLength - half + frameLength);
    let sumSquares = 0;
    for (let j = from; j < to; j++) {
      sumSquares += samples[j] * samples[j];
    }
    out[i] = Math.sqrt(sumSquares / frameLength);
  }
  return out;
}

function mean(values: ArrayLike<number>): number {
  if (values.length === 0) return 0;
  let sum = 0;
  for (let i = 0; i < values.length; i++) sum += values[i];
  return sum / values.length;
}

/** Population variance. */
function variance(values: ArrayLike<number>): number {
  if (values.length === 0) return 0;
  const m = mean(values);
  let sum = 0;
  for (let i = 0; i < values.length; i++) sum += (values[i] - m) ** 2;
  return sum / values.length;
}

function nextPowerOfTwo(n: number): number {
  let p = 1;
  while (p < n) p *= 2;
  return p;
}

function sanitize(samples: Float32Array): Float32Array {
  for (let i = 0; i < samples.length; i++) {
    if (!Number.isFinite(samples[i])) {
      return samples.map((s) => (Number.isFinite(s) ? s : 0));
    }
  }
  return samples;
}

// ─── Pitch ──────────────────────────────────────────────────────────────────────

export function pitchFrameLength(sampleRate: number, fminHz: number): number {
  return Math.max(1024, nextPowerOfTwo(Math.ceil((3 * sampleRate) / fminHz)));
}

/**
 * YIN-style F0 per analysis frame. Unvoiced or out-of-band frames are NaN so
 * callers can tell "no pitch here" from a real value.
 */
export function trackPitch(
  samples: Float32Array,
  sampleRate: number,
  options: SignalMetricsOptions = DEFAULT_SIGNAL_OPTIONS,
): Float64Array {
  const frameLength = pitchFrameLength(sampleRate, options.fminHz);
  const tauMax = Math.min(Math.floor(sampleRate / options.fminHz), frameLength - 2);
  const tauMin = Math.max(2, Math.floor(sampleRate / options.fmaxHz));
  const window = frameLength - tauMax;

  if (samples.length < frameLength || tauMax <= tauMin) return new Float64Array(0);

  const frameCount = 1 + Math.floor((samples.length - frameLength) / options.pitchHopLength);
  const track = new Float64Array(frameCount).fill(Number.NaN);

  let peak = 0;
  const energies = new Float64Array(frameCount);
  for (let f = 0; f < frameCount; f++) {
    const start = f * options.pitchHopLength;
    let sumSquares = 0;
    for (let j = 0; j < frameLength; j++) sumSquares += samples[start + j] ** 2;
    energies[f] = Math.sqrt(sumSquares / frameLength);
    if (energies[f] > peak) peak = energies[f];
  }
  if (peak < SILENCE_AMPLITUDE_FLOOR) return track;

  const voicingFloor = peak * 10 ** (-options.topDb / 20);
  const cmnd = new Float64Array(tauMax + 1);

  for (let f = 0; f < frameCount; f++) {
    if (energies[f] < voicingFloor) continue;
    const start = f * options.pitchHopLength;

    cmnd[0] = 1;
    let running = 0;
    for (let tau = 1; tau <= tauMax; tau++) {
      let d = 0;
      for (let j = 0; j < window; j++) {
        const delta = samples[start + j] - samples[start + j + tau];
        d += delta * delta;
      }
      running += d;
      cmnd[tau] = running > 0 ? (d * tau) / running : 1;
    }

    let tau = -1;
    for (let t = tauMin; t <= tauMax; t++) {
      if (cmnd[t] < options.yinThreshold) {
        tau = t;
        while (tau + 1 <= tauMax && cmnd[tau + 1] < cmnd[tau]) tau++;
        break;
      }
    }
    if (tau < 0) continue;

    let refined = tau;
    if (tau > 1 && tau < tauMax) {
      const a = cmnd[tau - 1];
      const b = cmnd[tau];
      const c = cmnd[tau + 1];
      const denom = a - 2 * b + c;
      if (denom !== 0) {
        const shift = (0.5 * (a - c)) / denom;
        if (Math.abs(shift) < 1) refined = tau + shift;
      }
    }

    const f0 = sampleRate / refined;
    if (f0 >= options.fminHz && f0 <= options.fmaxHz) {
      track[f] = f0;
    }
  }
  return track;
}

/**
 * Mean |Δf0| over consecutive frames that are both voiced. Fewer than
 * `minVoicedFrames` voiced frames is too little data: 0.
 */
export function computeJitter(track: Float64Array, minVoicedFrames: number): number {
  let voiced = 0;
  for (let i = 0; i < track.length; i++) if (!Number.isNaN(track[i])) voiced++;
  if (voiced < minVoicedFrames) return 0;

  let sum = 0;
  let pairs = 0;
  for (let i = 1; i < track.length; i++) {
    if (!Number.isNaN(track[i]) && !Number.isNaN(track[i - 1])) {
      sum += Math.abs(track[i] - track[i - 1]);
      pairs++;
    }
  }
  return pairs > 0 ? sum / pairs : 0;
}

/** Sign changes per sample pair; zero counts as positive. */
export function zeroCrossingRate(samples: Float32Array): number {
  if (samples.length < 2) return 0;
  let crossings = 0;
  for (let i = 1; i < samples.length; i++) {
    if (samples[i] >= 0 !== samples[i - 1] >= 0) crossings++;
  }
  return crossings / (samples.length - 1);
}

export function classifyVoiceRange(pitches: number[], lowHz: number, highHz: number): VoiceRange {
  if (pitches.length === 0) {
    return { lowPct: 0, midPct: 0, highPct: 0, dominant: "unknown" };
  }

  let low = 0;
  let high = 0;
  for (const p of pitches) {
    if (p < lowHz) low++;
    else if (p > highHz) high++;
  }
  const mid = pitches.length - low - high;
  const total = pitches.length;
  const lowPct = (low / total) * 100;
  const midPct = (mid / total) * 100;
  const highPct = (high / total) * 100;

  let dominant: VoiceRegister = "mid";
  if (lowPct > midPct && lowPct > highPct) dominant = "low";
  else if (highPct > midPct && highPct > lowPct) dominant = "high";

  return { lowPct, midPct, highPct, dominant };
}

// ─── Aggregate ──────────────────────────────────────────────────────────────────

export function emptySignalMetrics(durationSeconds = 0): SignalMetrics {
  return {
    averageVolumeDb: 0,
    volumeVariance: 0,
    energyVariance: 0,
    pitchMean: 0,
    pitchVariance: 0,
    jitter: 0,
    zeroCrossingRate: 0,
    voicedFrameCount: 0,
    voiceRange: { lowPct: 0, midPct: 0, highPct: 0, dominant: "unknown" },
    durationSeconds,
    insufficientData: true,
  };
}

export function computeSignalMetrics(
  input: Float32Array,
  sampleRate: number,
  overrides: Partial<SignalMetricsOptions> = {},
): SignalMetrics {
  const options: SignalMetricsOptions = { ...DEFAULT_SIGNAL_OPTIONS, ...overrides };

  if (!Number.isFinite(sampleRate) || sampleRate <= 0) {
    return emptySignalMetrics();
  }
  const durationSeconds = input.length / sampleRate;
  if (input.length < options.hopLength) {
    return emptySignalMetrics(durationSeconds);
  }

  const samples = sanitize(input);

  const rms = frameRms(samples, options.frameLength, options.hopLength);
  const db = rms.map(amplitudeToDb);
  const averageVolumeDb = mean(db);
  const volumeVariance = Math.sqrt(variance(db));
  const energyVariance = variance(rms);

  const track = trackPitch(samples, sampleRate, options);
  const pitches: number[] = [];
  for (let i = 0; i < track.length; i++) {
    if (!Number.isNaN(track[i])) pitches.push(track[i]);
  }

  const pitchMean = mean(pitches);
  const pitchVariance = pitches.length > 0 ? Math.sqrt(variance(pitches)) : 0;

  return {
    averageVolumeDb,
    volumeVariance,
    energyVariance,
    pitchMean,
    pitchVariance,
    jitter: computeJitter(track, options.minVoicedFramesForJitter),
    zeroCrossingRate: zeroCrossingRate(samples),
    voicedFrameCount: pitches.length,
    voiceRange: classifyVoiceRange(pitches, options.lowRegisterHz, options.highRegisterHz),
    durationSeconds,
    insufficientData: false,
  };
}
