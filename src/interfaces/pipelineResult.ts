export interface TransformResult {
    weatherFile: string;
    airQualityFile: string;
}

export type TaskName = 'extract' | 'transform' | 'load';

export type PipelineRunResult =
    | {
        status: 'success';
        snapshotFile: string | null;
        processed: TransformResult | null;
        durationMs: number;
    }
    | {
        status: 'failed';
        failedTask: TaskName;
        error: string;
        durationMs: number;
    };
