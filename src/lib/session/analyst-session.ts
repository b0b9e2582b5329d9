import { previewDataset, summarizeDataset } from "@/lib/data/dataset-loader";
import type {
  DashboardSpec,
  DashboardState,
  Dataset,
  DatasetSummary,
  Message,
  MessageKind,
  SessionSnapshot,
} from "@/lib/types";

export interface AnalystSessionOptions {
  id?: string;
  sampleRows?: number;
  now?: () => number;
}

/**
 * Memoria del agente para una sesion de UI: historial (solo se agrega),
 * dataset activo, dashboard activo y estado de aclaracion.
 */
export class AnalystSession {
  readonly id: string;
  private readonly sampleRows: number;
  private readonly now: () => number;

  private readonly history: Message[] = [];
  private activeDataset: Dataset | null = null;
  private activeSummary: DatasetSummary | null = null;
  private activeDashboard: DashboardState | null = null;
  private goal: string | null = null;
  private question: string | null = null;
  private insight: string | null = null;
  private carriedAssumptions: string[] = [];

  constructor(options: AnalystSessionOptions = {}) {
    this.id = options.id ?? crypto.randomUUID();
    this.sampleRows = options.sampleRows ?? 5;
    this.now = options.now ?? Date.now;
  }

  get messages(): readonly Message[] {
    return this.history;
  }

  get dataset(): Dataset | null {
    return this.activeDataset;
  }

  get summary(): DatasetSummary | null {
    return this.activeSummary;
  }

  get dashboard(): DashboardState | null {
    return this.activeDashboard;
  }

  get userGoal(): string | null {
    return this.goal;
  }

  get awaitingClarification(): boolean {
    return this.question !== null;
  }

  get pendingQuestion(): string | null {
    return this.question;
  }

  get latestInsight(): string | null {
    return this.insight;
  }

  get assumptions(): readonly string[] {
    return this.carriedAssumptions;
  }

  appendMessage(role: Message["role"], content: string, kind?: MessageKind): Message {
    const message: Message = Object.freeze({
      id: crypto.randomUUID(),
      role,
      content,
      createdAt: this.now(),
      ...(kind ? { kind } : {}),
    });
    this.history.push(message);
    return message;
  }

  /**
   * Reemplaza el dataset. El dashboard y la aclaracion pendiente apuntan a
   * columnas del dataset anterior, asi que se descartan; el historial queda.
   */
  setDataset(dataset: Dataset): void {
    this.activeDataset = dataset;
    this.activeSummary = summarizeDataset(dataset, this.sampleRows);
    this.activeDashboard = null;
    this.question = null;
    this.insight = null;
    this.carriedAssumptions = [];
  }

  /** El ultimo spec gana: no hay merge con el anterior. */
  setDashboard(spec: DashboardSpec): DashboardState {
    this.activeDashboard = {
      spec,
      revision: (this.activeDashboard?.revision ?? 0) + 1,
      timestamp: this.now(),
    };
    this.carriedAssumptions = spec.narrative?.assumptions ?? [];
    return this.activeDashboard;
  }

  setUserGoal(goal: string): void {
    this.goal = goal;
  }

  beginClarification(question: string): void {
    this.question = question;
  }

  /** Incorpora la respuesta del usuario al objetivo y cierra la aclaracion. */
  resolveClarification(answer: string): void {
    this.goal = this.goal ? `${this.goal} (aclaracion: ${answer})` : answer;
    this.question = null;
  }

  setInsight(text: string): void {
    this.insight = text;
  }

  snapshot(): SessionSnapshot {
    return {
      id: this.id,
      messages: [...this.history],
      dataset: this.activeDataset ? previewDataset(this.activeDataset) : null,
      dashboard: this.activeDashboard,
      userGoal: this.goal,
      awaitingClarification: this.awaitingClarification,
      pendingQuestion: this.question,
      latestInsight: this.insight,
      assumptions: [...this.carriedAssumptions],
    };
  }
}
