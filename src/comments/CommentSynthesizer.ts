/**
 * Comment Synthesizer
 *
 * Renders a declaration descriptor into Doxygen comment lines. Lines are
 * returned without line terminators; every line starts with the
 * descriptor's indentation.
 *
 * @since 2026-10-19
 */

import type {
  ClassDescriptor,
  DeclarationDescriptor,
  EnumDescriptor,
  FunctionDescriptor,
  TestCaseDescriptor,
  VariableDescriptor,
} from '../declarations/types.js';
import { defaultTestFrameworkAnalyzer } from '../testing/TestFrameworkAnalyzer.js';
import type { TestFrameworkAnalyzer } from '../testing/TestFrameworkAnalyzer.js';
import { DEFAULT_MAX_COVERAGE_POINTS } from '../testing/descriptions.js';
import { DocGenError, DocGenErrorCodes } from '../base/errors.js';
import { humanizeName } from './NameHumanizer.js';

export interface SynthesisOptions {
  /** Exception named by the generic `@throws` line */
  baseException?: string;

  /** Upper bound on coverage bullets in test comments */
  maxCoveragePoints?: number;

  /** Source of framework display names and suite labels */
  analyzer?: TestFrameworkAnalyzer;
}

export const DEFAULT_BASE_EXCEPTION = 'std::exception';

/**
 * Collects comment lines under one indentation
 */
class CommentBuilder {
  private lines: string[];

  constructor(private readonly indent: string) {
    this.lines = [`${indent}/**`];
  }

  line(text = ''): this {
    this.lines.push(text ? `${this.indent} * ${text}` : `${this.indent} *`);
    return this;
  }

  build(): string[] {
    return [...this.lines, `${this.indent} */`];
  }
}

// ============================================================================
// Per-kind templates
// ============================================================================

function classComment(descriptor: ClassDescriptor): string[] {
  const label = `${descriptor.classKind} ${descriptor.name}`;
  return new CommentBuilder(descriptor.indentation)
    .line(`@brief ${label}`)
    .line()
    .line(`@details Detailed description of ${label}`)
    .build();
}

function enumComment(descriptor: EnumDescriptor): string[] {
  return new CommentBuilder(descriptor.indentation)
    .line(`@brief Enum ${descriptor.name}`)
    .line()
    .line(`@details Detailed description of enum ${descriptor.name}`)
    .build();
}

function variableComment(descriptor: VariableDescriptor): string[] {
  const builder = new CommentBuilder(descriptor.indentation)
    .line(`@brief Variable ${descriptor.name}`)
    .line();

  if (descriptor.isStatic) builder.line('@static');
  if (descriptor.isConstexpr) builder.line('@constexpr');
  if (descriptor.isMutable) builder.line('@mutable');
  return builder.build();
}

export function functionBrief(descriptor: FunctionDescriptor): string {
  const owner = descriptor.ownerClass ?? descriptor.name;
  if (descriptor.isCopyConstructor) return `Copy constructor for ${owner}`;
  if (descriptor.isMoveConstructor) return `Move constructor for ${owner}`;
  if (descriptor.isCopyAssignment) return `Copy assignment operator for ${owner}`;
  if (descriptor.isMoveAssignment) return `Move assignment operator for ${owner}`;
  if (descriptor.isConstructor) return `Constructor for ${owner}`;
  if (descriptor.isDestructor) return `Destructor for ${owner}`;
  return humanizeName(descriptor.name);
}

function functionComment(descriptor: FunctionDescriptor, baseException: string): string[] {
  const builder = new CommentBuilder(descriptor.indentation)
    .line(`@brief ${functionBrief(descriptor)}`)
    .line('@details');

  for (const parameter of descriptor.parameters) {
    if (parameter.name) builder.line(`@param ${parameter.name}`);
  }

  const returnsValue = descriptor.returnType !== '' && descriptor.returnType !== 'void';
  if (returnsValue && !descriptor.isConstructor && !descriptor.isDestructor) {
    builder.line(`@return ${descriptor.returnType}`);
  }

  if (descriptor.throwSpec) {
    // `throw()` lists nothing and promises not to throw
    for (const type of descriptor.throwSpec) builder.line(`@throws ${type}`);
  } else if (!descriptor.isNoexcept) {
    builder.line(`@throws ${baseException} on error`);
  }

  if (descriptor.isStatic) builder.line('@static');
  if (descriptor.isConst) builder.line('@const');
  return builder.build();
}

function testCaseComment(
  descriptor: TestCaseDescriptor,
  analyzer: TestFrameworkAnalyzer,
  maxCoveragePoints: number
): string[] {
  const builder = new CommentBuilder(descriptor.indentation)
    .line(`@brief ${analyzer.describe(descriptor.testName)}`)
    .line()
    .line('@details');

  if (descriptor.testSuite) builder.line(`${analyzer.suiteLabel(descriptor.framework)}: ${descriptor.testSuite}`);
  if (descriptor.fixtureClass) builder.line(`Test Fixture: ${descriptor.fixtureClass}`);
  builder.line(`Framework: ${analyzer.displayName(descriptor.framework)}`);

  const points = analyzer.coverage(descriptor.assertions, maxCoveragePoints);
  if (points.length > 0) {
    builder.line().line('Test Coverage:');
    for (const point of points) builder.line(`- ${point}`);
  }

  return builder.line().line(`@test ${descriptor.testType}`).build();
}

function assertNever(value: never): never {
  throw new DocGenError(`Unhandled declaration descriptor: ${JSON.stringify(value)}`, DocGenErrorCodes.INTERNAL_ERROR);
}

// ============================================================================
// Entry point
// ============================================================================

export function synthesizeComment(descriptor: DeclarationDescriptor, options: SynthesisOptions = {}): string[] {
  switch (descriptor.kind) {
    case 'class':
      return classComment(descriptor);
    case 'enum':
      return enumComment(descriptor);
    case 'variable':
      return variableComment(descriptor);
    case 'function':
      return functionComment(descriptor, options.baseException ?? DEFAULT_BASE_EXCEPTION);
    case 'testCase':
      return testCaseComment(
        descriptor,
        options.analyzer ?? defaultTestFrameworkAnalyzer,
        options.maxCoveragePoints ?? DEFAULT_MAX_COVERAGE_POINTS
      );
    default:
      return assertNever(descriptor);
  }
}
