import * as fs from 'fs';
import * as path from 'path';

export interface StageTrace {
  timestamp: string;
  stage: string;
  line_count: number;
  duration_ms: number;
  success: boolean;
  error?: string;
}

export interface CalculationSummary {
  line_items: number;
  total_usd: number;
}

export interface CalculationTrace {
  calculation_id: string;
  label: string;
  started_at: string;
  completed_at?: string;
  stages: StageTrace[];
  summary: CalculationSummary | null;
}

export class CalculationTraceLogger {
  private trace: CalculationTrace;

  constructor(calculationId: string, label: string) {
    this.trace = {
      calculation_id: calculationId,
      label,
      started_at: new Date().toISOString(),
      stages: [],
      summary: null
    };
  }

  /**
   * Log one calculator stage
   */
  logStage(
    stage: string,
    lineCount: number,
    durationMs: number,
    success: boolean = true,
    error?: string
  ): void {
    this.trace.stages.push({
      timestamp: new Date().toISOString(),
      stage,
      line_count: lineCount,
      duration_ms: durationMs,
      success,
      error
    });
  }

  /**
   * Mark the calculation finished
   */
  complete(summary: CalculationSummary): void {
    this.trace.completed_at = new Date().toISOString();
    this.trace.summary = summary;
  }

  /**
   * Write the trace as JSON and return its path
   */
  save(runsDir: string): string {
    if (!fs.existsSync(runsDir)) {
      fs.mkdirSync(runsDir, { recursive: true });
    }
    const tracePath = path.join(runsDir, `trace-${this.trace.calculation_id}.json`);
    fs.writeFileSync(tracePath, JSON.stringify(this.trace, null, 2), 'utf-8');
    return tracePath;
  }

  getTrace(): CalculationTrace {
    return {
      ...this.trace,
      stages: this.trace.stages.map(stage => ({ ...stage })),
      summary: this.trace.summary ? { ...this.trace.summary } : null
    };
  }

  getSummary(): string {
    const totalStages = this.trace.stages.length;
    const successfulStages = this.trace.stages.filter(s => s.success).length;
    const totalDuration = this.trace.stages.reduce((sum, s) => sum + s.duration_ms, 0);

    return `
Calculation Summary:
- Stages: ${totalStages}
- Successful: ${successfulStages}
- Failed: ${totalStages - successfulStages}
- Total Duration: ${totalDuration}ms
    `.trim();
  }
}
