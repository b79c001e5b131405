// Interview Voice Analyzer - Speaker turn assignment
// Attaches diarization labels to transcript segments by maximum overlap and
// maps raw labels ("speaker_0", ...) onto interview roles.

import { UNKNOWN_SPEAKER } from "./types.js";
import type { DiarizationTurn, RoleStrategy, SpeakerRole, TranscriptSegment } from "./types.js";

function overlap(segment: TranscriptSegment, turn: DiarizationTurn): number {
  return Math.max(0, Math.min(segment.end, turn.end) - Math.max(segment.start, turn.start));
}

/**
 * Returns new segments with `speaker` set to the label of the turn that
 * overlaps each segment the most. Ties go to the turn that starts first;
 * no overlap at all yields "unknown". Inputs are not mutated, and running
 * it again on its own output gives the same labels.
 */
export function assignSpeakers(segments: TranscriptSegment[], turns: DiarizationTurn[]): TranscriptSegment[] {
  const ordered = [...turns].sort((a, b) => a.start - b.start);

  return segments.map((segment) => {
    let best = UNKNOWN_SPEAKER;
    let bestOverlap = 0;
    for (const turn of ordered) {
      const amount = overlap(segment, turn);
      if (amount > bestOverlap) {
        best = turn.speakerLabel;
        bestOverlap = amount;
      }
    }
    return { ...segment, speaker: best };
  });
}

/** Distinct labels in order of first appearance, "unknown" excluded. */
export function speakerLabelsInOrder(segments: TranscriptSegment[]): string[] {
  const seen: string[] = [];
  const byStart = [...segments].sort((a, b) => a.start - b.start);
  for (const segment of byStart) {
    const label = segment.speaker ?? UNKNOWN_SPEAKER;
    if (label !== UNKNOWN_SPEAKER && !seen.includes(label)) {
      seen.push(label);
    }
  }
  return seen;
}

/** Total segment seconds per label. */
export function talkTimeByLabel(segments: TranscriptSegment[]): Map<string, number> {
  const totals = new Map<string, number>();
  for (const segment of segments) {
    const label = segment.speaker ?? UNKNOWN_SPEAKER;
    totals.set(label, (totals.get(label) ?? 0) + Math.max(0, segment.end - segment.start));
  }
  return totals;
}

/**
 * Maps every raw label to a role.
 *
 * earliest-first: the first label to speak is the interviewer.
 * most-talkative: the label with the most talk time is the interviewer
 * (ties keep first-appearance order).
 *
 * The other of the first two labels is the candidate; any further label is
 * "speaker-N" counting from 3 in first-appearance order.
 */
export function resolveRoles(
  segments: TranscriptSegment[],
  strategy: RoleStrategy = "earliest-first",
): Map<string, SpeakerRole> {
  const labels = speakerLabelsInOrder(segments);
  const roles = new Map<string, SpeakerRole>();
  if (segments.some((s) => (s.speaker ?? UNKNOWN_SPEAKER) === UNKNOWN_SPEAKER)) {
    roles.set(UNKNOWN_SPEAKER, "unknown");
  }
  if (labels.length === 0) return roles;

  let interviewer = labels[0];
  if (strategy === "most-talkative") {
    const totals = talkTimeByLabel(segments);
    for (const label of labels) {
      if ((totals.get(label) ?? 0) > (totals.get(interviewer) ?? 0)) {
        interviewer = label;
      }
    }
  }

  roles.set(interviewer, "interviewer");
  const [first, second] = labels;
  const candidate = interviewer === first ? second : first;
  if (candidate !== undefined) {
    roles.set(candidate, "candidate");
  }

  let next = 3;
  for (const label of labels) {
    if (!roles.has(label)) {
      roles.set(label, `speaker-${next}`);
      next++;
    }
  }
  return roles;
}
