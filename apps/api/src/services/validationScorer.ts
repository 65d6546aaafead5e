import { z } from "zod";

import type { ModelVerdict, NormalizedMcq } from "./mcqSchema.js";
import type { EvidenceItem, ValidationEntry } from "./mcqValidator.js";

export const ScoringConfigSchema = z
  .object({
    embeddingWeight: z.number().min(0).max(1).default(0.4),
    modelWeight: z.number().min(0).max(1).default(0.5),
    evidenceWeight: z.number().min(0).max(1).default(0.1),
    excellentThreshold: z.number().default(85),
    goodThreshold: z.number().default(70),
    acceptableThreshold: z.number().default(55),
    questionableThreshold: z.number().default(40)
  })
  .refine((c) => Math.abs(c.embeddingWeight + c.modelWeight + c.evidenceWeight - 1) <= 0.001, {
    message: "Scoring weights must sum to 1.0"
  })
  .refine(
    (c) =>
      c.questionableThreshold <= c.acceptableThreshold &&
      c.acceptableThreshold <= c.goodThreshold &&
      c.goodThreshold <= c.excellentThreshold,
    { message: "Category thresholds must be in ascending order" }
  );

export type ScoringConfig = z.infer<typeof ScoringConfigSchema>;

export type QualityCategory = "EXCELLENT" | "GOOD" | "ACCEPTABLE" | "QUESTIONABLE" | "POOR";

export type QualityDecision = {
  decision:
    | "APPROVE"
    | "APPROVE_WITH_REVIEW"
    | "CONDITIONAL_APPROVE"
    | "REVIEW_REQUIRED"
    | "REJECT_WITH_FEEDBACK"
    | "REJECT";
  action: string;
  reasoning: string;
  priority: "LOW" | "MEDIUM" | "HIGH" | "CRITICAL";
  score: number;
  category: QualityCategory;
};

export type Recommendation = {
  type: "QUALITY_CONCERN" | "EXCELLENT_QUALITY" | "HIGH_REJECTION_RATE";
  severity: "INFO" | "MEDIUM" | "HIGH";
  message: string;
  action: string;
};

export type BatchReport = {
  processed: Record<string, { mcq: NormalizedMcq; score: number; decision: QualityDecision }>;
  summary: {
    total: number;
    approved: number;
    conditional: number;
    reviewRequired: number;
    rejected: number;
    averageScore: number;
    distribution: Record<QualityCategory, number>;
  };
  metrics: { passRate: number; highQualityRate: number; needsAttention: string[] };
  recommendations: Recommendation[];
};

const round1 = (n: number) => n.toFixed(1);
const percent = (n: number) => `${(n * 100).toFixed(1)}%`;

export class ValidationScorer {
  readonly config: ScoringConfig;

  constructor(config: Partial<z.input<typeof ScoringConfigSchema>> = {}) {
    this.config = ScoringConfigSchema.parse(config);
  }

  /**
   * Weighted 0-100 score from embedding similarity, model verdict and evidence.
   * When the model was never asked, the other two components carry the whole weight.
   */
  score(entry: ValidationEntry): number {
    const c = this.config;
    const retrieval =
      embeddingComponent(entry.max_similarity, entry.supported_by_embeddings) * c.embeddingWeight +
      evidenceComponent(entry.evidence) * c.evidenceWeight;
    const retrievalWeight = c.embeddingWeight + c.evidenceWeight;

    const askedModel = entry.verification === "done" || entry.verification === "failed";
    const total =
      askedModel || retrievalWeight === 0
        ? (retrieval + modelComponent(entry.model_verdict) * c.modelWeight) * 100
        : (retrieval / retrievalWeight) * 100;
    return Math.min(100, Math.max(0, total));
  }

  category(score: number): QualityCategory {
    const c = this.config;
    if (score >= c.excellentThreshold) return "EXCELLENT";
    if (score >= c.goodThreshold) return "GOOD";
    if (score >= c.acceptableThreshold) return "ACCEPTABLE";
    if (score >= c.questionableThreshold) return "QUESTIONABLE";
    return "POOR";
  }

  decide(entry: ValidationEntry): QualityDecision {
    const score = this.score(entry);
    const category = this.category(score);
    const base = { score, category };

    switch (category) {
      case "EXCELLENT":
        return {
          ...base,
          decision: "APPROVE",
          action: "Use as-is",
          reasoning: `Excellent validation score (${round1(score)}). High confidence in accuracy.`,
          priority: "LOW"
        };
      case "GOOD":
        return {
          ...base,
          decision: "APPROVE_WITH_REVIEW",
          action: "Minor review recommended",
          reasoning: `Good validation score (${round1(score)}). Consider a quick review.`,
          priority: "LOW"
        };
      case "ACCEPTABLE": {
        const verdict = entry.model_verdict;
        if (verdict?.supported && verdict.confidence >= 0.8) {
          return {
            ...base,
            decision: "CONDITIONAL_APPROVE",
            action: "Review model evidence",
            reasoning: `Acceptable score (${round1(score)}) but strong model support. Review context alignment.`,
            priority: "MEDIUM"
          };
        }
        return {
          ...base,
          decision: "REVIEW_REQUIRED",
          action: "Manual review needed",
          reasoning: `Acceptable score (${round1(score)}) but weak model support. Manual verification needed.`,
          priority: "HIGH"
        };
      }
      case "QUESTIONABLE":
        return {
          ...base,
          decision: "REJECT_WITH_FEEDBACK",
          action: "Regenerate with feedback",
          reasoning: `Low score (${round1(score)}). Evidence: ${entry.evidence.length} chunks, similarity: ${entry.max_similarity.toFixed(2)}`,
          priority: "HIGH"
        };
      case "POOR":
        return {
          ...base,
          decision: "REJECT",
          action: "Regenerate completely",
          reasoning: `Very low score (${round1(score)}). Poor evidence support and model confidence.`,
          priority: "CRITICAL"
        };
    }
  }

  processBatch(mcqs: Record<string, NormalizedMcq>, validation: Record<string, ValidationEntry>): BatchReport {
    const report: BatchReport = {
      processed: {},
      summary: {
        total: 0,
        approved: 0,
        conditional: 0,
        reviewRequired: 0,
        rejected: 0,
        averageScore: 0,
        distribution: { EXCELLENT: 0, GOOD: 0, ACCEPTABLE: 0, QUESTIONABLE: 0, POOR: 0 }
      },
      metrics: { passRate: 0, highQualityRate: 0, needsAttention: [] },
      recommendations: []
    };

    let scoreSum = 0;
    for (const [qid, entry] of Object.entries(validation)) {
      const mcq = mcqs[qid];
      if (!mcq) continue;

      const decision = this.decide(entry);
      report.processed[qid] = { mcq, score: decision.score, decision };
      report.summary.total += 1;
      report.summary.distribution[decision.category] += 1;
      scoreSum += decision.score;

      switch (decision.decision) {
        case "APPROVE":
        case "APPROVE_WITH_REVIEW":
          report.summary.approved += 1;
          break;
        case "CONDITIONAL_APPROVE":
          report.summary.conditional += 1;
          break;
        case "REVIEW_REQUIRED":
          report.summary.reviewRequired += 1;
          break;
        default:
          report.summary.rejected += 1;
      }
      if (decision.priority === "HIGH" || decision.priority === "CRITICAL") report.metrics.needsAttention.push(qid);
    }

    const { total, approved, conditional, rejected } = report.summary;
    if (total > 0) {
      report.summary.averageScore = scoreSum / total;
      report.metrics.passRate = (approved + conditional) / total;
      report.metrics.highQualityRate = approved / total;
    }
    report.recommendations = recommend(report.metrics, total, rejected);
    return report;
  }
}

function embeddingComponent(maxSimilarity: number, supported: boolean): number {
  return maxSimilarity * 0.875 + (supported ? 0.125 : 0);
}

// A failed verification contributes no support.
function modelComponent(verdict: ModelVerdict | null): number {
  if (!verdict) return 0;
  if (!verdict.supported) return verdict.confidence * 0.3;
  return 0.5 + verdict.confidence * 0.5;
}

function evidenceComponent(evidence: EvidenceItem[]): number {
  if (evidence.length === 0) return 0;
  const quantity = Math.min(0.5, evidence.length * 0.125);
  const quality = (evidence.reduce((acc, e) => acc + e.score, 0) / evidence.length) * 0.5;
  return quantity + quality;
}

function recommend(metrics: BatchReport["metrics"], total: number, rejected: number): Recommendation[] {
  const out: Recommendation[] = [];
  if (total === 0) return out;
  if (metrics.passRate < 0.5) {
    out.push({
      type: "QUALITY_CONCERN",
      severity: "HIGH",
      message: `Low pass rate (${percent(metrics.passRate)}). Consider adjusting generation parameters.`,
      action: "Review generation settings, chunk quality, or source material"
    });
  }
  if (metrics.highQualityRate > 0.8) {
    out.push({
      type: "EXCELLENT_QUALITY",
      severity: "INFO",
      message: `High quality rate (${percent(metrics.highQualityRate)}). Current settings work well.`,
      action: "Keep current generation parameters"
    });
  }
  if (rejected > total * 0.3) {
    out.push({
      type: "HIGH_REJECTION_RATE",
      severity: "MEDIUM",
      message: `High rejection rate (${rejected}/${total}). Quality issues detected.`,
      action: "Review source material quality and consider stricter content filtering"
    });
  }
  return out;
}

export function quickSummary(report: BatchReport) {
  const { summary } = report;
  const passed = summary.approved + summary.conditional;
  return {
    totalQuestions: summary.total,
    passed,
    failed: summary.rejected + summary.reviewRequired,
    passRate: summary.total > 0 ? percent(passed / summary.total) : "0%",
    averageScore: round1(summary.averageScore),
    distribution: summary.distribution,
    topRecommendations: report.recommendations.slice(0, 3),
    needsAttention: report.metrics.needsAttention
  };
}
