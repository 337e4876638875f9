/**
 * Validation engine: loads source files and runs the schema analysis over
 * every class they declare.
 */
import type { Config } from '../config/schema.js';
import { analyzeTypes } from '../schema/analyzer.js';
import { CollectingSink, SeverityFilterSink } from '../diagnostics/sink.js';
import { TypeScriptMetadataProvider } from '../../metadata/typescript.js';
import type { MetadataProvider } from '../../metadata/types.js';
import type { BatchValidationResult, ValidationResult } from './types.js';

/**
 * Source access the engine needs on top of reading types.
 */
export interface SourceMetadataProvider extends MetadataProvider {
  addFile(filePath: string): Promise<void>;
  addSource(filePath: string, content: string): void;
}

/** Validation engine that orchestrates schema checking. */
export class ValidationEngine {
  private config: Config;
  private provider: SourceMetadataProvider;

  constructor(config: Config, provider?: SourceMetadataProvider) {
    this.config = config;
    this.provider = provider ?? new TypeScriptMetadataProvider();
  }

  /**
   * Validate files on disk. All files are loaded before any is analyzed so
   * enums imported across them resolve.
   */
  async validateFiles(filePaths: string[]): Promise<BatchValidationResult> {
    for (const filePath of filePaths) {
      await this.provider.addFile(filePath);
    }

    const results = filePaths.map(filePath => this.validateLoaded(filePath));
    return { results, summary: this.summarize(results) };
  }

  /**
   * Validate source content without touching the disk.
   */
  validateSource(filePath: string, content: string): ValidationResult {
    this.provider.addSource(filePath, content);
    return this.validateLoaded(filePath);
  }

  /**
   * Release resources.
   */
  dispose(): void {
    this.provider.dispose();
  }

  private validateLoaded(filePath: string): ValidationResult {
    const collected = new CollectingSink();
    const analyses = analyzeTypes(this.provider.getTypes(filePath), {
      modules: this.config.modules,
      strictGroups: this.config.strict_groups,
      sink: new SeverityFilterSink(collected, this.config.rules),
    });

    const errorCount = collected.errorCount;
    const warningCount = collected.warningCount;

    return {
      status: errorCount > 0 ? 'fail' : warningCount > 0 ? 'warn' : 'pass',
      file: filePath,
      types: analyses.map(analysis => ({
        name: analysis.type.name,
        skipped: analysis.skipped,
        groups: analysis.schema ? analysis.schema.groups.toJSON() : null,
      })),
      diagnostics: collected.diagnostics,
      errorCount,
      warningCount,
    };
  }

  private summarize(results: ValidationResult[]): BatchValidationResult['summary'] {
    let typesAnalyzed = 0;
    let typesSkipped = 0;
    for (const result of results) {
      for (const type of result.types) {
        if (type.skipped) {
          typesSkipped++;
        } else {
          typesAnalyzed++;
        }
      }
    }
    return {
      files: results.length,
      typesAnalyzed,
      typesSkipped,
      totalErrors: results.reduce((sum, r) => sum + r.errorCount, 0),
      totalWarnings: results.reduce((sum, r) => sum + r.warningCount, 0),
    };
  }
}
