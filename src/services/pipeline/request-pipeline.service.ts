import type {
  ClassificationResult,
  ConfidenceCalculation,
  ExtractionResult,
  GenerationOptions,
  GenerationResult,
  SelectionCriteria,
  SelectionResult,
  TemplateCatalog,
  ValidationOptions,
  ValidationResult,
} from '@core/interfaces/index.js';
import { ConfidenceCalculator } from '@services/confidence/confidence-calculator.service.js';
import { EntityExtractor } from '@services/entities/entity-extractor.service.js';
import { JSONGenerator } from '@services/generation/json-generator.service.js';
import { IntentClassifier } from '@services/intent/intent-classifier.service.js';
import { TemplateSelector } from '@services/selection/template-selector.service.js';
import { TemplateValidator } from '@services/validation/template-validator.service.js';
import { logger } from '@utils/logger.js';

export type PipelineDecision = 'proceed' | 'clarify' | 'reject';

export interface PipelineOptions {
  strictMode?: boolean;
  failOnWarnings?: boolean;
  selection?: Partial<SelectionCriteria>;
  generation?: Partial<GenerationOptions>;
}

export interface PipelineOperation {
  generation: GenerationResult;
  validation: ValidationResult;
}

export interface PipelineResult {
  text: string;
  classification: ClassificationResult;
  extraction: ExtractionResult;
  confidence: ConfidenceCalculation;
  selection: SelectionResult;
  operations: PipelineOperation[];
  decision: PipelineDecision;
  processingTimeMs: number;
}

export interface RequestPipelineDeps {
  catalog: TemplateCatalog;
  classifier?: IntentClassifier;
  extractor?: EntityExtractor;
  calculator?: ConfidenceCalculator;
  selector?: TemplateSelector;
  generator?: JSONGenerator;
  validator?: TemplateValidator;
}

/**
 * Advisory outcome for the caller: nothing to run or very low confidence
 * rejects; proceeding needs high confidence and clean, valid operations.
 */
export function decide(
  confidence: Pick<ConfidenceCalculation, 'level'>,
  selection: Pick<SelectionResult, 'selectedTemplates'>,
  operations: readonly PipelineOperation[],
): PipelineDecision {
  if (selection.selectedTemplates.length === 0 || operations.length === 0) return 'reject';
  if (confidence.level === 'very_low') return 'reject';
  const clean = operations.every((op) => op.validation.isValid && op.generation.errors.length === 0);
  if (clean && (confidence.level === 'high' || confidence.level === 'very_high')) return 'proceed';
  return 'clarify';
}

export class RequestPipeline {
  readonly catalog: TemplateCatalog;
  readonly classifier: IntentClassifier;
  readonly extractor: EntityExtractor;
  readonly calculator: ConfidenceCalculator;
  readonly selector: TemplateSelector;
  readonly generator: JSONGenerator;
  readonly validator: TemplateValidator;

  constructor(deps: RequestPipelineDeps) {
    this.catalog = deps.catalog;
    this.classifier = deps.classifier ?? new IntentClassifier();
    this.extractor = deps.extractor ?? new EntityExtractor();
    this.calculator = deps.calculator ?? new ConfidenceCalculator();
    this.selector = deps.selector ?? new TemplateSelector();
    this.generator = deps.generator ?? new JSONGenerator();
    this.validator = deps.validator ?? new TemplateValidator();
  }

  async process(text: string, options: PipelineOptions = {}): Promise<PipelineResult> {
    const started = performance.now();
    const classification = this.classifier.classify(text);
    const extraction = this.extractor.extract(text);
    const confidence = this.calculator.calculate(text, classification, extraction);

    const criteria = this.selector.buildCriteria(classification, extraction, options.selection);
    const selection = this.selector.select(this.catalog, criteria);

    const validationOptions: Partial<ValidationOptions> = {
      ...(options.strictMode !== undefined ? { strictMode: options.strictMode } : {}),
      ...(options.failOnWarnings !== undefined ? { failOnWarnings: options.failOnWarnings } : {}),
    };

    const generationOptions: Partial<GenerationOptions> = {
      ...(options.strictMode !== undefined ? { strictValidation: options.strictMode } : {}),
      ...options.generation,
    };

    const operations: PipelineOperation[] = [];
    for (const templateId of this.operationIds(selection)) {
      const template = this.catalog.getTemplate(templateId);
      if (!template) continue;
      const generation = this.generator.generate(template, classification, extraction, generationOptions);
      const validation = this.validator.validate(
        generation,
        template.validationRules,
        template.metadata,
        validationOptions,
      );
      operations.push({ generation, validation });

      const success = generation.errors.length === 0 && validation.isValid;
      const errorType = success ? undefined : generation.errors.length > 0 ? 'generation' : 'validation';
      await this.catalog.recordTemplateUsage(templateId, success, generation.processingTimeMs, errorType);
    }

    const decision = decide(confidence, selection, operations);
    const result: PipelineResult = {
      text,
      classification,
      extraction,
      confidence,
      selection,
      operations,
      decision,
      processingTimeMs: performance.now() - started,
    };

    logger.info(
      {
        intent: classification.primaryIntent.intent,
        confidence: confidence.overallConfidence,
        templates: operations.map((op) => op.generation.templateId),
        decision,
      },
      '[pipeline] request processed',
    );
    return result;
  }

  /** Plan steps in plan order when a multi-step plan exists, otherwise every selected template by rank. */
  private operationIds(selection: SelectionResult): string[] {
    if (selection.multiStepPlan.length > 0) return selection.multiStepPlan.map((step) => step.templateId);
    return selection.selectedTemplates.map((score) => score.templateId);
  }
}
