import type { StepRegistry } from "../core/step-definition";
import collectInfo from "./collect-info";
import diagnoseIssue from "./diagnose-issue";
import executeActions from "./execute-actions";
import generateReport from "./generate-report";
import planActions from "./plan-actions";
import processAlert from "./process-alert";

export const defaultSteps: StepRegistry = {
  process_alert: processAlert,
  diagnose_issue: diagnoseIssue,
  plan_actions: planActions,
  execute_actions: executeActions,
  generate_report: generateReport,
  collect_info: collectInfo,
};
