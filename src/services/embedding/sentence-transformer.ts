/**
 * SentenceTransformerClient - TypeScript bridge to python/embedding_worker.py
 *
 * Runs sentence-transformers (all-MiniLM-L6-v2 by default) in a child
 * process so inference never blocks the event loop. Texts go over stdin as
 * a JSON array; the worker answers with one JSON line.
 *
 * @module services/embedding/sentence-transformer
 */

import { PythonShell, type Options as PythonShellOptions } from 'python-shell';
import { existsSync } from 'fs';
import path from 'path';
import { fileURLToPath } from 'url';
import { z } from 'zod';
import { EMBEDDING_DIMENSION } from '../config.js';
import { EmbeddingError, type EmbeddingClient, type EmbeddingErrorCode } from './client.js';

const __dirname = path.dirname(fileURLToPath(import.meta.url));

/** python/ sits at the package root, three levels up from src/ and four from dist/src/ */
export const DEFAULT_WORKER_PATH =
  [
    path.resolve(__dirname, '../../../python/embedding_worker.py'),
    path.resolve(__dirname, '../../../../python/embedding_worker.py'),
  ].find((candidate) => existsSync(candidate)) ??
  path.resolve(__dirname, '../../../python/embedding_worker.py');

/** Result line printed by the worker */
const WorkerResultSchema = z.object({
  success: z.boolean(),
  embeddings: z.array(z.array(z.number())).default([]),
  count: z.number().optional(),
  elapsed_ms: z.number().optional(),
  device: z.string().optional(),
  model: z.string().optional(),
  error: z.string().nullable().optional(),
  error_code: z.string().nullable().optional(),
  details: z.record(z.unknown()).optional(),
});

type WorkerResult = z.infer<typeof WorkerResultSchema>;

export interface SentenceTransformerOptions {
  modelName: string;
  workerPath?: string;
  pythonPath?: string;
  /** Token limit the worker enforces with the model's own tokenizer */
  maxInputTokens: number;
  /** Batch size passed to model.encode */
  batchSize: number;
  timeoutMs: number;
}

export class SentenceTransformerClient implements EmbeddingClient {
  readonly modelName: string;
  readonly dimensions = EMBEDDING_DIMENSION;
  private readonly workerPath: string;
  private readonly pythonPath: string | undefined;
  private readonly maxInputTokens: number;
  private readonly batchSize: number;
  private readonly timeoutMs: number;
  private _lastDevice: string = 'unknown';

  /** Maximum texts per worker invocation, bounds worker memory */
  private static readonly MAX_TEXTS_PER_CALL = 100;

  /** Max stderr accumulation: 10KB */
  private static readonly MAX_STDERR_LENGTH = 10_240;

  constructor(options: SentenceTransformerOptions) {
    this.modelName = options.modelName;
    this.workerPath = options.workerPath ?? DEFAULT_WORKER_PATH;
    this.pythonPath = options.pythonPath;
    this.maxInputTokens = options.maxInputTokens;
    this.batchSize = options.batchSize;
    this.timeoutMs = options.timeoutMs;
  }

  /**
   * Device used by the last successful call ('cpu', 'cuda:0', 'mps', ...)
   */
  getLastDevice(): string {
    return this._lastDevice;
  }

  async embedBatch(texts: string[]): Promise<Float32Array[]> {
    if (texts.length === 0) {
      return [];
    }

    const maxPerCall = SentenceTransformerClient.MAX_TEXTS_PER_CALL;
    const vectors: Float32Array[] = [];
    for (let i = 0; i < texts.length; i += maxPerCall) {
      const slice = texts.slice(i, i + maxPerCall);
      if (texts.length > maxPerCall) {
        console.error(
          `[SentenceTransformer] Worker call ${Math.floor(i / maxPerCall) + 1}/${Math.ceil(texts.length / maxPerCall)} (${slice.length} texts)`
        );
      }
      vectors.push(...(await this.embedSingleCall(slice)));
    }
    return vectors;
  }

  private async embedSingleCall(texts: string[]): Promise<Float32Array[]> {
    const args = [
      '--stdin',
      '--model',
      this.modelName,
      '--batch-size',
      this.batchSize.toString(),
      '--max-tokens',
      this.maxInputTokens.toString(),
      '--json',
    ];
    const result = await this.runWorker(args, JSON.stringify(texts));

    if (!result.success) {
      throw new EmbeddingError(
        result.error ?? 'Embedding generation failed with no error message',
        this.classifyError(result.error_code ?? null, result.error ?? null),
        { count: texts.length, device: result.device, ...result.details }
      );
    }

    if (result.embeddings.length !== texts.length) {
      throw new EmbeddingError(
        `Worker returned ${result.embeddings.length} embeddings for ${texts.length} texts`,
        'EMBEDDING_FAILED',
        { expected: texts.length, actual: result.embeddings.length }
      );
    }

    this._lastDevice = result.device ?? 'unknown';
    return result.embeddings.map((e) => new Float32Array(e));
  }

  private async runWorker(args: string[], stdin: string): Promise<WorkerResult> {
    return new Promise((resolve, reject) => {
      let settled = false;
      const options: PythonShellOptions = {
        mode: 'text',
        pythonPath: this.pythonPath,
        pythonOptions: ['-u'],
        args,
      };

      const shell = new PythonShell(this.workerPath, options);
      let stderr = '';
      let sigkillTimer: ReturnType<typeof setTimeout> | null = null;

      // Kill the worker if the model hangs; escalate to SIGKILL after 5s
      const timer = setTimeout(() => {
        if (settled) return;
        try {
          shell.kill();
        } catch (error) {
          console.error(
            '[SentenceTransformer] Failed to kill shell on timeout:',
            error instanceof Error ? error.message : String(error)
          );
        }
        sigkillTimer = setTimeout(() => {
          if (settled) return;
          console.error(
            `[SentenceTransformer] Process did not exit after SIGTERM, sending SIGKILL (pid: ${shell.childProcess?.pid})`
          );
          try {
            shell.childProcess?.kill('SIGKILL');
          } catch (error) {
            console.error(
              '[SentenceTransformer] Failed to SIGKILL process (may already be gone):',
              error instanceof Error ? error.message : String(error)
            );
          }
          settled = true;
          reject(
            new EmbeddingError(
              `Embedding worker timeout after ${this.timeoutMs}ms (SIGKILL after 5s grace)`,
              'WORKER_ERROR',
              { stderr: stderr.substring(0, 1000) }
            )
          );
        }, 5000);
      }, this.timeoutMs);

      const outputLines: string[] = [];
      shell.on('message', (msg: string) => {
        outputLines.push(msg);
      });

      shell.on('stderr', (err: string) => {
        if (stderr.length < SentenceTransformerClient.MAX_STDERR_LENGTH) {
          stderr += err + '\n';
        }
      });

      const handleEnd = (err?: Error) => {
        clearTimeout(timer);
        if (sigkillTimer) clearTimeout(sigkillTimer);
        if (settled) return;
        settled = true;

        // A worker that exits non-zero after printing a structured error
        // still reports the most useful message through its JSON line.
        const parsed = this.parseOutput(outputLines);
        if (parsed) {
          resolve(parsed);
          return;
        }

        if (err) {
          console.error('[SentenceTransformer] Worker error:', err.message);
          if (stderr) console.error('[SentenceTransformer] Stderr:', stderr.substring(0, 1000));
          reject(
            new EmbeddingError(`Worker error: ${err.message}`, this.classifyError(null, stderr || err.message), {
              stderr: stderr.substring(0, 1000),
            })
          );
          return;
        }

        const output = outputLines.join('\n');
        console.error('[SentenceTransformer] Parse error: no valid JSON result in output');
        reject(
          new EmbeddingError(
            output.trim() ? 'Failed to parse worker output as JSON' : 'Worker produced no output',
            output.trim() ? 'PARSE_ERROR' : 'WORKER_ERROR',
            { output: output.substring(0, 1000), stderr: stderr.substring(0, 1000) }
          )
        );
      };

      shell.send(stdin);
      shell.end(handleEnd);
    });
  }

  /**
   * Find the last line that is a valid worker result. Libraries may print
   * progress text to stdout before it.
   */
  private parseOutput(lines: string[]): WorkerResult | null {
    for (let i = lines.length - 1; i >= 0; i--) {
      const line = lines[i].trim();
      if (!line.startsWith('{')) continue;
      let json: unknown;
      try {
        json = JSON.parse(line);
      } catch (error) {
        console.error(
          '[SentenceTransformer] JSON parse failed for output line, trying previous:',
          error instanceof Error ? error.message : String(error)
        );
        continue;
      }
      const result = WorkerResultSchema.safeParse(json);
      if (result.success) return result.data;
    }
    return null;
  }

  private classifyError(code: string | null, message: string | null): EmbeddingErrorCode {
    if (code === 'INPUT_TOO_LONG' || code === 'EMPTY_INPUT' || code === 'MODEL_NOT_FOUND') {
      return code;
    }
    const lower = (message ?? '').toLowerCase();
    if (lower.includes('model not found') || lower.includes('no such file') || lower.includes('not a valid model')) {
      return 'MODEL_NOT_FOUND';
    }
    return 'EMBEDDING_FAILED';
  }
}
