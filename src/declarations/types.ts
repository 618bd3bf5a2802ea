/**
 * Types for Declaration Matchers
 *
 * Every recognized declaration is described by one member of the
 * DeclarationDescriptor union, discriminated by `kind`.
 *
 * @since 2026-10-19
 */

/**
 * Declaration kinds the scanner can document
 */
export type DeclarationKind = 'class' | 'function' | 'enum' | 'variable' | 'testCase';

/**
 * Test-macro dialects understood by the test framework analyzer
 */
export type TestDialectTag = 'gtest' | 'catch2' | 'doctest' | 'boost' | 'cppunit';

/**
 * Fields shared by every descriptor
 */
interface DescriptorBase {
  /** Declared identifier (unqualified) */
  name: string;

  /** Leading whitespace of the declaration line, reproduced on every comment line */
  indentation: string;
}

export interface ClassDescriptor extends DescriptorBase {
  kind: 'class';
  classKind: 'class' | 'struct';

  /** Raw base-class list after ':' (empty when none) */
  bases: string;
}

/**
 * A single function parameter. `name` is empty for unnamed parameters.
 */
export interface ParameterDecl {
  type: string;
  name: string;
}

/**
 * How a function declaration ends
 */
export type FunctionDefinition = 'declaration' | 'body' | 'defaulted' | 'deleted' | 'pure';

export interface FunctionDescriptor extends DescriptorBase {
  kind: 'function';

  /** Return type with storage and qualifier keywords stripped */
  returnType: string;

  parameters: ParameterDecl[];

  /** Qualifier of an out-of-class definition (`Foo` in `Foo::bar`) */
  scope?: string;

  /** Enclosing class at match time, else the last segment of `scope` */
  ownerClass?: string;

  definition: FunctionDefinition;

  isConst: boolean;
  isStatic: boolean;
  isNoexcept: boolean;

  /** Types listed in a dynamic exception specification, `throw(A, B)` */
  throwSpec?: string[];

  isConstructor: boolean;
  isDestructor: boolean;
  isCopyConstructor: boolean;
  isMoveConstructor: boolean;
  isCopyAssignment: boolean;
  isMoveAssignment: boolean;
}

export interface EnumDescriptor extends DescriptorBase {
  kind: 'enum';
  isScoped: boolean;
  underlyingType?: string;
}

export interface VariableDescriptor extends DescriptorBase {
  kind: 'variable';
  type: string;
  isStatic: boolean;
  isConstexpr: boolean;
  isMutable: boolean;
}

export interface TestCaseDescriptor extends DescriptorBase {
  kind: 'testCase';
  framework: TestDialectTag;

  /** Test name, or the first macro argument for string-named dialects */
  testName: string;

  /** Suite, tag list or enclosing test-suite block */
  testSuite?: string;

  /** Macro that introduced the case (TEST_F, TEST_CASE, ...) */
  testType: string;

  fixtureClass?: string;

  /** Assertion macros present in the body, in vocabulary order */
  assertions: string[];
}

export type DeclarationDescriptor =
  | ClassDescriptor
  | FunctionDescriptor
  | EnumDescriptor
  | VariableDescriptor
  | TestCaseDescriptor;

/**
 * Result of a successful match: the descriptor plus the index of the last
 * consumed line
 */
export interface MatchResult<T extends DeclarationDescriptor = DeclarationDescriptor> {
  descriptor: T;
  endIndex: number;
}

/**
 * Context a matcher may consult
 */
export interface MatchContext {
  /** Innermost enclosing class or struct, if any */
  currentClass?: string;
}
