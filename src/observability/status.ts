import type { SessionRecord } from "../core/types";

export type StatusSection = "overview" | "sessions" | "session";

export const buildOverviewLines = (input: {
  sessions: SessionRecord[];
  adapters: { active: number; queued: number; concurrency: number };
}): string[] => {
  const waiting = input.sessions.filter(
    (session) => session.status === "waiting",
  ).length;
  return [
    `sessions=${input.sessions.length}`,
    `waiting=${waiting}`,
    `running=${input.sessions.length - waiting}`,
    `adapters=${input.adapters.active}/${input.adapters.concurrency}`,
    `adapter_queue=${input.adapters.queued}`,
  ];
};

const lastStep = (session: SessionRecord): string =>
  session.history.at(-1)?.step ?? "none";

export const buildSessionLines = (sessions: SessionRecord[]): string[] =>
  sessions.length > 0
    ? sessions.map(
        (session) =>
          `${session.id}: ${session.status} after ${lastStep(session)} (cycles=${session.cycles}, errors=${session.state.errors.length})`,
      )
    : ["No active sessions"];

export const buildSessionDetailLines = (session: SessionRecord): string[] => {
  const { state } = session;
  const lines = [
    `session ${session.id} (${session.status})`,
    `created ${session.created_at}, updated ${session.updated_at}`,
  ];

  if (session.waiting_since) {
    lines.push(`waiting since ${session.waiting_since}`);
  }
  if (state.alertInfo) {
    lines.push(`alert ${state.alertInfo.id} [${state.alertInfo.severity}]`);
  }
  if (state.diagnosticResult) {
    lines.push(
      `diagnosis ${state.diagnosticResult.id}: ${state.diagnosticResult.rootCause} (${state.diagnosticResult.confidenceScore.toFixed(2)})`,
    );
  }
  if (state.actionPlan) {
    lines.push(
      `plan ${state.actionPlan.id}: ${state.actionPlan.steps.length} step(s), risk ${state.actionPlan.riskLevel}`,
    );
  }
  if (state.executionResult) {
    lines.push(`execution ${state.executionResult.status}`);
  }
  for (const request of state.pendingCollection ?? []) {
    lines.push(`pending ${request.field}: ${request.reason}`);
  }
  if (state.routingTrace) {
    lines.push(
      `next ${state.routingTrace.nextStep}: ${state.routingTrace.rationale}`,
    );
  }
  for (const error of state.errors.slice(-5)) {
    lines.push(`error ${error.kind} from ${error.source}: ${error.message}`);
  }
  return lines;
};

const renderSection = (title: string, lines: string[]): string[] => [
  `=== ${title} ===`,
  ...(lines.length > 0 ? lines : ["(empty)"]),
];

const renderTable = (headers: string[], rows: string[][]): string[] => {
  if (rows.length === 0) {
    return ["(empty)"];
  }

  const widths = headers.map((header, index) =>
    Math.max(header.length, ...rows.map((row) => (row[index] ?? "").length)),
  );

  const formatRow = (values: string[]): string =>
    values
      .map((value, index) => value.padEnd(widths[index] ?? 0))
      .join(" | ")
      .trimEnd();

  return [
    formatRow(headers),
    widths.map((width) => "-".repeat(width)).join("-+-"),
    ...rows.map((row) => formatRow(row)),
  ];
};

const paginate = <T>(items: T[], page: number, pageSize: number): T[] => {
  const offset = (Math.max(1, page) - 1) * pageSize;
  return items.slice(offset, offset + pageSize);
};

export const buildStatusLines = (input: {
  section: StatusSection;
  sessions: SessionRecord[];
  adapters: { active: number; queued: number; concurrency: number };
  sessionId?: string;
  page?: number;
  pageSize?: number;
}): string[] => {
  const page = Math.max(1, input.page ?? 1);
  const pageSize = Math.max(1, input.pageSize ?? 20);

  if (input.section === "overview") {
    return [
      ...renderSection("status", buildOverviewLines(input)),
      ...renderSection("sessions", buildSessionLines(input.sessions).slice(0, 5)),
    ];
  }

  if (input.section === "sessions") {
    const rows = paginate(input.sessions, page, pageSize).map((session) => [
      session.id,
      session.status,
      lastStep(session),
      String(session.cycles),
      String(session.state.errors.length),
    ]);
    return renderSection(
      `sessions page ${page}`,
      renderTable(["id", "status", "last_step", "cycles", "errors"], rows),
    );
  }

  const session = input.sessions.find((entry) => entry.id === input.sessionId);
  return renderSection(
    "session",
    session ? buildSessionDetailLines(session) : ["session not found"],
  );
};
