/**
 * ComponentExtractor: Decodes BIO labels into premise and conclusion spans.
 *
 * Two independent accumulators run over the same token stream, one per
 * component kind. A run stays open while its kind's B-/I- labels continue
 * and closes on the first label of any other kind, so every emitted
 * component is a maximal contiguous run.
 *
 * Precondition on the tag source: one label per token. Since a label
 * belongs to at most one kind, a token can never open runs in both
 * accumulators at once.
 */

import { MisalignedSequenceError } from "../errors";
import type {
  AlignedToken,
  Component,
  ComponentKind,
  ExtractedComponents,
  Label,
} from "./ArgumentAnalysis.types";

const CANONICAL_LABELS: ReadonlySet<string> = new Set<Label>(["B-P", "I-P", "B-C", "I-C", "O"]);

/** Long-form labels written by older tagger builds */
const LABEL_ALIASES: Readonly<Record<string, Label>> = {
  "B-Premise": "B-P",
  "I-Premise": "I-P",
  "B-Claim": "B-C",
  "I-Claim": "I-C",
};

const KIND_LABELS: Record<ComponentKind, ReadonlySet<Label>> = {
  premise: new Set<Label>(["B-P", "I-P"]),
  conclusion: new Set<Label>(["B-C", "I-C"]),
};

function isLabel(raw: string): raw is Label {
  return CANONICAL_LABELS.has(raw);
}

/** Anything outside the tag set decodes as outside. */
export function normalizeLabel(raw: string): Label {
  if (isLabel(raw)) return raw;
  return LABEL_ALIASES[raw] ?? "O";
}

interface RunToken {
  text: string;
  start: number;
  end: number;
}

type RunState =
  | { status: "outside" }
  | { status: "accumulating"; run: RunToken[] };

/**
 * Accumulator for one component kind. State is reset on every flush.
 */
class SpanAccumulator {
  private state: RunState = { status: "outside" };
  private readonly emitted: Component[] = [];

  constructor(private readonly kind: ComponentKind) {}

  feed(label: Label, token: AlignedToken): void {
    if (KIND_LABELS[this.kind].has(label)) {
      const entry = { text: token.text, start: token.start, end: token.end };
      if (this.state.status === "accumulating") {
        this.state.run.push(entry);
      } else {
        this.state = { status: "accumulating", run: [entry] };
      }
      return;
    }
    this.flush();
  }

  flush(): void {
    if (this.state.status === "outside") return;

    const { run } = this.state;
    const tokens = Object.freeze(run.map((t) => t.text));
    this.emitted.push(
      Object.freeze({
        kind: this.kind,
        text: tokens.join(" "),
        tokens,
        startPos: run[0].start,
        endPos: run[run.length - 1].end,
        sequenceOrder: this.emitted.length,
      })
    );
    this.state = { status: "outside" };
  }

  components(): readonly Component[] {
    return Object.freeze([...this.emitted]);
  }
}

/**
 * Decode aligned tokens and their labels into ordered components.
 * Throws MisalignedSequenceError when the two sequences differ in length.
 */
export function extractComponents(
  tokens: readonly AlignedToken[],
  labels: readonly string[]
): ExtractedComponents {
  if (tokens.length !== labels.length) {
    throw new MisalignedSequenceError(tokens.length, labels.length, {
      operation: "extractComponents",
    });
  }

  const premises = new SpanAccumulator("premise");
  const conclusions = new SpanAccumulator("conclusion");

  tokens.forEach((token, i) => {
    const label = normalizeLabel(labels[i]);
    premises.feed(label, token);
    conclusions.feed(label, token);
  });

  premises.flush();
  conclusions.flush();

  return Object.freeze({
    premises: premises.components(),
    conclusions: conclusions.components(),
  });
}

/** Plain text lists of premises and conclusions, in text order */
export function extractComponentTexts(
  tokens: readonly AlignedToken[],
  labels: readonly string[]
): { premises: string[]; conclusions: string[] } {
  const { premises, conclusions } = extractComponents(tokens, labels);
  return {
    premises: premises.map((c) => c.text),
    conclusions: conclusions.map((c) => c.text),
  };
}
