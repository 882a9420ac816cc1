import type { RankedAssessment, RunMetadata } from "../../types";
import type {
  ComplianceRepository,
  RunStatus,
  StoreFeedFetchParams,
  StoredAssessment,
} from "../../storage";

interface MemoryRun {
  id: string;
  triggeredBy: string;
  metadata: RunMetadata;
  status: RunStatus | "running";
  stats?: Record<string, unknown>;
  error?: string;
}

/**
 * In-process ComplianceRepository for pipeline tests.
 */
export class MemoryComplianceRepository implements ComplianceRepository {
  runs: MemoryRun[] = [];
  fetches: StoreFeedFetchParams[] = [];
  assessments: StoredAssessment[] = [];

  constructor(private readonly options: { failOn?: "storeAssessments" } = {}) {}

  async createRun(params: { triggeredBy: string; metadata: RunMetadata }): Promise<string> {
    const id = `run-${this.runs.length + 1}`;
    this.runs.push({ id, status: "running", ...params });
    return id;
  }

  async finishRun(
    runId: string,
    params: { status: RunStatus; stats?: Record<string, unknown>; error?: string }
  ): Promise<void> {
    const run = this.runs.find((candidate) => candidate.id === runId);
    if (!run) throw new Error(`Unknown run ${runId}`);
    Object.assign(run, params);
  }

  async storeFeedFetch(params: StoreFeedFetchParams): Promise<string> {
    this.fetches.push(params);
    return `fetch-${this.fetches.length}`;
  }

  async storeAssessments(
    runId: string,
    ranked: readonly RankedAssessment[]
  ): Promise<{ inserted: number }> {
    if (this.options.failOn === "storeAssessments") {
      throw new Error("connection terminated");
    }
    this.assessments.push(...ranked.map((assessment) => ({ ...assessment, runId })));
    return { inserted: ranked.length };
  }

  async listRunAssessments(
    runId: string,
    options: { limit?: number } = {}
  ): Promise<StoredAssessment[]> {
    const rows = this.assessments
      .filter((assessment) => assessment.runId === runId)
      .sort((a, b) => a.rank - b.rank);
    return options.limit ? rows.slice(0, options.limit) : rows;
  }
}
