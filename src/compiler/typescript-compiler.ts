import { createRequire } from 'node:module';
import { createContext, Script } from 'node:vm';
import type * as TypeScript from 'typescript';
import { CompilerUnavailableError, MaterializationError, type CompileDiagnostic } from '../core/errors.js';
import type { CompilationUnit, SourceCompiler } from './types.js';

type TypeScriptModule = typeof TypeScript;

/** Loads the `typescript` module; throws when it is not installed. */
export type TypeScriptLoader = () => TypeScriptModule;

export interface TypeScriptCompilerOptions {
  /** Replaces the default `require('typescript')` lookup. */
  loader?: TypeScriptLoader;
  /** Per-compile evaluation timeout in milliseconds (no limit by default). */
  timeoutMs?: number;
}

const requireModule = createRequire(import.meta.url);

function loadTypeScript(): TypeScriptModule {
  const ts: TypeScriptModule = requireModule('typescript');
  return ts;
}

function messageOf(err: unknown): string {
  // Errors thrown inside the vm context are not instances of this realm's Error
  const message: unknown = typeof err === 'object' && err !== null ? Reflect.get(err, 'message') : undefined;
  return typeof message === 'string' ? message : String(err);
}

/**
 * Compiles generated sources with `typescript`'s `transpileModule` and
 * evaluates the output in a fresh `node:vm` context per unit.
 *
 * `typescript` is an optional peer dependency and is loaded lazily; when it
 * cannot be loaded every compile throws {@link CompilerUnavailableError}.
 */
export class TypeScriptCompiler implements SourceCompiler {
  readonly name = 'typescript';
  private readonly loader: TypeScriptLoader;
  private readonly timeoutMs: number | undefined;
  private ts: TypeScriptModule | undefined;
  private loadError: unknown;

  constructor(options: TypeScriptCompilerOptions = {}) {
    this.loader = options.loader ?? loadTypeScript;
    this.timeoutMs = options.timeoutMs;
  }

  isAvailable(): boolean {
    return this.tryLoad() !== undefined;
  }

  compile(unit: CompilationUnit): unknown {
    const ts = this.tryLoad();
    if (!ts) {
      throw new CompilerUnavailableError(unit.typeName, `cannot load "typescript": ${messageOf(this.loadError)}`, this.loadError);
    }

    const output = ts.transpileModule(unit.source, {
      compilerOptions: {
        target: ts.ScriptTarget.ES2022,
        module: ts.ModuleKind.CommonJS,
        moduleDetection: ts.ModuleDetectionKind.Force,
        strict: true,
      },
      fileName: `${unit.typeName}.ts`,
      reportDiagnostics: true,
    });

    const diagnostics = (output.diagnostics ?? [])
      .filter((d) => d.category === ts.DiagnosticCategory.Error)
      .map((d) => toCompileDiagnostic(ts, d));
    if (diagnostics.length > 0) {
      throw new MaterializationError(
        `Compilation of ${unit.typeName} failed:\n` + diagnostics.map(formatDiagnostic).join('\n'),
        { typeName: unit.typeName, source: unit.source, diagnostics },
      );
    }

    const context = createContext({ ...unit.globals, exports: {} });
    let value: unknown;
    try {
      const script = new Script(output.outputText, { filename: `${unit.typeName}.js` });
      value = script.runInContext(context, this.timeoutMs === undefined ? {} : { timeout: this.timeoutMs });
    } catch (err) {
      throw new MaterializationError(`Evaluation of ${unit.typeName} failed: ${messageOf(err)}`, {
        typeName: unit.typeName,
        source: unit.source,
        cause: err,
      });
    }

    if (typeof value !== 'function') {
      throw new MaterializationError(`Evaluation of ${unit.typeName} did not produce a class`, {
        typeName: unit.typeName,
        source: unit.source,
      });
    }
    return value;
  }

  private tryLoad(): TypeScriptModule | undefined {
    if (this.ts === undefined && this.loadError === undefined) {
      try {
        this.ts = this.loader();
      } catch (err) {
        this.loadError = err;
      }
    }
    return this.ts;
  }
}

function toCompileDiagnostic(ts: TypeScriptModule, d: TypeScript.Diagnostic): CompileDiagnostic {
  const message = ts.flattenDiagnosticMessageText(d.messageText, '\n');
  if (d.file && typeof d.start === 'number') {
    const pos = d.file.getLineAndCharacterOfPosition(d.start);
    return { message, code: d.code, line: pos.line + 1, column: pos.character + 1 };
  }
  return { message, code: d.code };
}

export function formatDiagnostic(d: CompileDiagnostic): string {
  const where = d.line === undefined ? '' : `${d.line}:${d.column ?? 1} `;
  const code = d.code === undefined ? 'TS' : `TS${d.code}`;
  return `${where}${code}: ${d.message}`;
}
