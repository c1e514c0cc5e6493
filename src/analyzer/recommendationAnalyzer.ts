import { BEST_PRACTICES } from "./recommendationRules";
import { TopologyData } from "./topology/types";

export type RecommendationCategory = "security" | "performance" | "observability" | "resilience";
export type RecommendationSeverity = "critical" | "high" | "medium" | "low";

export type FixRecommendation = {
  type: string;
  template: string;
  command?: string;
  manualSteps?: string[];
};

export type Recommendation = {
  id: string;
  title: string;
  description: string;
  category: RecommendationCategory;
  severity: RecommendationSeverity;
  service?: string;
  namespace?: string;
  fix: FixRecommendation;
  impact: string;
};

export type CheckResult = {
  passed: boolean;
  findings: Recommendation[];
};

export type BestPractice = {
  id: string;
  name: string;
  category: RecommendationCategory;
  severity: RecommendationSeverity;
  check: (topology: TopologyData) => CheckResult;
};

export type CheckDetail = {
  id: string;
  name: string;
  passed: boolean;
  findings: number;
};

export type BestPracticeReport = {
  score: number;
  passed: number;
  total: number;
  checks: CheckDetail[];
  recommendations: Recommendation[];
};

export type ComplianceDetails = {
  score: number;
  passedChecks: number;
  totalChecks: number;
  checks: Record<string, boolean>;
  recommendationsCount: number;
};

/** Runs every check once; score and findings come from the same pass. */
export function evaluateBestPractices(
  topology: TopologyData,
  practices: BestPractice[] = BEST_PRACTICES
): BestPracticeReport {
  const checks: CheckDetail[] = [];
  const recommendations: Recommendation[] = [];
  let passed = 0;

  for (const bp of practices) {
    const r = bp.check(topology);
    if (r.passed) passed++;
    recommendations.push(...r.findings);
    checks.push({ id: bp.id, name: bp.name, passed: r.passed, findings: r.findings.length });
  }

  const total = practices.length;
  return {
    score: total ? Math.floor((passed * 100) / total) : 100,
    passed,
    total,
    checks,
    recommendations
  };
}

export function getRecommendations(topology: TopologyData): Recommendation[] {
  return evaluateBestPractices(topology).recommendations;
}

export function complianceFromReport(report: BestPracticeReport): { score: number; details: ComplianceDetails } {
  const checks: Record<string, boolean> = {};
  for (const c of report.checks) checks[c.id] = c.passed;
  return {
    score: report.score,
    details: {
      score: report.score,
      passedChecks: report.passed,
      totalChecks: report.total,
      checks,
      recommendationsCount: report.recommendations.length
    }
  };
}

export function getComplianceScore(topology: TopologyData): { score: number; details: ComplianceDetails } {
  return complianceFromReport(evaluateBestPractices(topology));
}
