/**
 * Wire shapes for analysis results. The core hands out camelCase value
 * objects; everything leaving the plugin (action data, stored records)
 * goes through these functions.
 */

import { DENSITY_DECIMALS } from "../config/constants";
import type {
  ArgumentAnalysis,
  ArgumentSuggestion,
  Component,
  Paragraph,
} from "../services/ArgumentAnalysis.types";

export type SerializedComponent = {
  type: Component["kind"];
  text: string;
  tokens: string[];
  start_pos: number;
  end_pos: number;
  sequence_order: number;
};

export type SerializedParagraph = {
  text: string;
  strength: Paragraph["strengthCategory"];
  strength_score: number;
  premises_count: number;
  conclusions_count: number;
  word_count: number;
  density: number;
  recommendation: string | null;
  start_pos: number;
  end_pos: number;
};

export type SerializedSuggestion = {
  component_type: ArgumentSuggestion["componentKind"];
  original_text: string;
  suggestion: string;
  explanation: string;
  applied: boolean;
};

export type SerializedAnalysis = {
  premises: SerializedComponent[];
  conclusions: SerializedComponent[];
  paragraph_analysis: SerializedParagraph[];
  suggestions: SerializedSuggestion[];
  total_premises: number;
  total_conclusions: number;
  analyzed_at: string;
};

export function roundDensity(density: number): number {
  const factor = 10 ** DENSITY_DECIMALS;
  return Math.round(density * factor) / factor;
}

export function serializeComponent(c: Component): SerializedComponent {
  return {
    type: c.kind,
    text: c.text,
    tokens: [...c.tokens],
    start_pos: c.startPos,
    end_pos: c.endPos,
    sequence_order: c.sequenceOrder,
  };
}

export function serializeParagraph(p: Paragraph): SerializedParagraph {
  return {
    text: p.text,
    strength: p.strengthCategory,
    strength_score: p.strengthScore,
    premises_count: p.premisesCount,
    conclusions_count: p.conclusionsCount,
    word_count: p.wordCount,
    density: roundDensity(p.density),
    recommendation: p.recommendation,
    start_pos: p.startPos,
    end_pos: p.endPos,
  };
}

export function serializeSuggestion(s: ArgumentSuggestion): SerializedSuggestion {
  return {
    component_type: s.componentKind,
    original_text: s.originalText,
    suggestion: s.suggestion,
    explanation: s.explanation,
    applied: s.applied,
  };
}

export function serializeAnalysis(
  analysis: ArgumentAnalysis,
  suggestions: readonly ArgumentSuggestion[] = []
): SerializedAnalysis {
  return {
    premises: analysis.premises.map(serializeComponent),
    conclusions: analysis.conclusions.map(serializeComponent),
    paragraph_analysis: analysis.paragraphs.map(serializeParagraph),
    suggestions: suggestions.map(serializeSuggestion),
    total_premises: analysis.totalPremises,
    total_conclusions: analysis.totalConclusions,
    analyzed_at: analysis.analyzedAt,
  };
}

function numberedList(title: string, items: readonly Component[], emptyLine: string): string {
  if (items.length === 0) return emptyLine;
  return [title, ...items.map((c, i) => `${i + 1}. ${c.text}`)].join("\n");
}

/** Human-readable summary for chat replies. */
export function formatAnalysisSummary(analysis: ArgumentAnalysis): string {
  const sections = [
    "Análisis del texto:",
    numberedList("Premisas identificadas:", analysis.premises, "No se identificaron premisas claras."),
    numberedList("Conclusiones identificadas:", analysis.conclusions, "No se identificaron conclusiones claras."),
  ];

  if (analysis.paragraphs.length > 0) {
    const lines = analysis.paragraphs.map((p) => {
      const tip = p.recommendation ? `: ${p.recommendation}` : "";
      return `${p.index + 1}. ${p.strengthCategory} (${p.strengthScore}/100, ` +
        `${p.premisesCount} premisas, ${p.conclusionsCount} conclusiones)${tip}`;
    });
    sections.push(["Fuerza por párrafo:", ...lines].join("\n"));
  }

  return sections.join("\n\n");
}
