import { minimatch } from "minimatch";
import type { ApprovalPolicy } from "../config/engine-config";
import type { ActionPlan, ApprovalDecision } from "./schema";

export interface ApprovalAssessment {
  required: boolean;
  reasons: string[];
}

const words = (text: string | undefined): string[] =>
  (text ?? "")
    .toLowerCase()
    .split(/[\s;|&]+/)
    .filter(Boolean);

export const assessApproval = (
  plan: ActionPlan,
  config: { approvalPolicy: ApprovalPolicy; approvalPatterns: string[] },
): ApprovalAssessment => {
  if (config.approvalPolicy === "never") {
    return { required: false, reasons: [] };
  }

  if (config.approvalPolicy === "always") {
    return { required: true, reasons: ["approval policy is always"] };
  }

  const reasons: string[] = [];
  if (plan.riskLevel === "high" || plan.riskLevel === "critical") {
    reasons.push(`plan risk level is ${plan.riskLevel}`);
  }

  for (const step of plan.steps) {
    const candidates = [...words(step.command), ...words(step.description)];
    const pattern = config.approvalPatterns.find((glob) =>
      candidates.some((word) => minimatch(word, glob, { nocase: true })),
    );
    if (pattern) {
      reasons.push(`step ${step.id} matches ${pattern}`);
    }
  }

  return { required: reasons.length > 0, reasons };
};

const APPROVE = new Set(["approve", "approved", "yes", "y", "ok", "proceed"]);
const REJECT = new Set(["reject", "rejected", "deny", "denied", "no", "n", "cancel"]);
const MODIFY = new Set(["modify", "modified", "change", "update", "revise"]);

/**
 * Reads an operator's answer; anything ambiguous yields `undefined`. A
 * modification may carry the requested change after the keyword, as in
 * "modify: restart one node at a time".
 */
export const parseApprovalDecision = (
  input: string | undefined,
): ApprovalDecision | undefined => {
  const answer = (input ?? "").trim().toLowerCase().replace(/[.!]+$/, "");
  if (APPROVE.has(answer)) {
    return "approved";
  }
  if (REJECT.has(answer)) {
    return "rejected";
  }
  const [keyword = ""] = answer.split(/[\s:,;]+/, 1);
  if (MODIFY.has(keyword)) {
    return "modified";
  }
  return undefined;
};
