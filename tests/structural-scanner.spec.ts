/**
 * Tests for the structural scanner
 */
import { describe, it, expect } from 'vitest';
import { scanSource, StructuralScanner } from '../src/scanner/StructuralScanner.js';
import { splitSourceLines } from '../src/scanner/source-lines.js';
import type { ScanOptions } from '../src/scanner/types.js';

function source(...lines: string[]): string {
  return lines.map(line => `${line}\n`).join('');
}

function documented(content: string, options?: ScanOptions): string {
  return scanSource(content, options).lines.join('');
}

/**
 * True when every input line appears, unmodified and in order, in the output
 */
function preservesInput(input: string, output: string): boolean {
  const outputLines = splitSourceLines(output);
  let cursor = 0;
  for (const line of splitSourceLines(input)) {
    while (cursor < outputLines.length && outputLines[cursor] !== line) cursor++;
    if (cursor === outputLines.length) return false;
    cursor++;
  }
  return true;
}

const MIXED_HEADER = source(
  '#pragma once',
  '',
  '#include <string>',
  '',
  'namespace geo {',
  '',
  'enum class Unit {',
  '    Meter,',
  '    Foot',
  '};',
  '',
  'template <typename T>',
  'class Shape : public Base {',
  'public:',
  '    Shape();',
  '    virtual ~Shape();',
  '    virtual double area() const = 0;',
  '    void resize(double factor) {',
  '        scale_ *= factor;',
  '    }',
  '',
  'private:',
  '    double scale_ = 1.0;',
  '    static int count_;',
  '};',
  '',
  'int area(int w, int h) {',
  '    int result = w * h;',
  '    return result;',
  '}',
  '',
  '}  // namespace geo'
);

const DOCTEST_FILE = source(
  '#include <doctest/doctest.h>',
  '',
  'TEST_SUITE("math") {',
  '    TEST_CASE("adds numbers") {',
  '        CHECK(1 + 1 == 2);',
  '    }',
  '}',
  '',
  'TEST_CASE("stands alone") {',
  '}'
);

const BOOST_FILE = source(
  '#define BOOST_TEST_MODULE demo',
  '#include <boost/test/unit_test.hpp>',
  '',
  'BOOST_AUTO_TEST_SUITE(arith)',
  '',
  'BOOST_AUTO_TEST_CASE(adds_values)',
  '{',
  '    BOOST_CHECK_EQUAL(1 + 1, 2);',
  '}',
  '',
  'BOOST_AUTO_TEST_SUITE_END()',
  '',
  'BOOST_AUTO_TEST_CASE(standalone)',
  '{',
  '    BOOST_CHECK(true);',
  '}'
);

describe('StructuralScanner', () => {
  describe('declarations', () => {
    it('should document a prototype with parameters and return type', () => {
      expect(documented('int add(int a, int b);\n')).toBe(
        source(
          '/**',
          ' * @brief Adds a new',
          ' * @details',
          ' * @param a',
          ' * @param b',
          ' * @return int',
          ' * @throws std::exception on error',
          ' */',
          'int add(int a, int b);'
        )
      );
    });

    it('should document the four special members', () => {
      const input = source(
        'class Foo {',
        'public:',
        '    Foo();',
        '    ~Foo();',
        '    Foo(const Foo& other);',
        '    Foo(Foo&& other) noexcept;',
        '};'
      );

      expect(documented(input)).toBe(
        source(
          '/**',
          ' * @brief class Foo',
          ' *',
          ' * @details Detailed description of class Foo',
          ' */',
          'class Foo {',
          'public:',
          '    /**',
          '     * @brief Constructor for Foo',
          '     * @details',
          '     * @throws std::exception on error',
          '     */',
          '    Foo();',
          '    /**',
          '     * @brief Destructor for Foo',
          '     * @details',
          '     * @throws std::exception on error',
          '     */',
          '    ~Foo();',
          '    /**',
          '     * @brief Copy constructor for Foo',
          '     * @details',
          '     * @param other',
          '     * @throws std::exception on error',
          '     */',
          '    Foo(const Foo& other);',
          '    /**',
          '     * @brief Move constructor for Foo',
          '     * @details',
          '     * @param other',
          '     */',
          '    Foo(Foo&& other) noexcept;',
          '};'
        )
      );
    });

    it('should leave forward declarations and anonymous enums alone', () => {
      const input = source('class Forward;', 'enum { A, B };');
      const result = scanSource(input);

      expect(result.lines.join('')).toBe(input);
      expect(result.comments).toEqual([]);
    });

    it('should emit generic throws only without noexcept', () => {
      expect(documented(source('void f() noexcept;', 'void g();'))).toBe(
        source(
          '/**',
          ' * @brief F',
          ' * @details',
          ' */',
          'void f() noexcept;',
          '',
          '/**',
          ' * @brief G',
          ' * @details',
          ' * @throws std::exception on error',
          ' */',
          'void g();'
        )
      );
    });

    it('should not document statements inside function bodies', () => {
      const input = source('namespace geo {', '', 'int area(int w, int h) {', '    int result = w * h;', '    return result;', '}', '', '}');
      const result = scanSource(input);

      expect(result.comments.map(c => c.name)).toEqual(['area']);
      expect(result.lines.join('')).toBe(
        source(
          'namespace geo {',
          '',
          '/**',
          ' * @brief Area',
          ' * @details',
          ' * @param w',
          ' * @param h',
          ' * @return int',
          ' * @throws std::exception on error',
          ' */',
          'int area(int w, int h) {',
          '    int result = w * h;',
          '    return result;',
          '}',
          '',
          '}'
        )
      );
    });

    it('should skip enum bodies', () => {
      const result = scanSource(source('enum class Color {', '    Red,', '    Green', '};', 'int x;'));

      expect(result.comments.map(c => [c.kind, c.name])).toEqual([
        ['enum', 'Color'],
        ['variable', 'x'],
      ]);
    });

    it('should anchor template declarations at the template line', () => {
      const input = source('template <typename T>', 'class Box {', 'public:', '    T get() const;', '};');

      expect(documented(input)).toBe(
        source(
          '/**',
          ' * @brief class Box',
          ' *',
          ' * @details Detailed description of class Box',
          ' */',
          'template <typename T>',
          'class Box {',
          'public:',
          '    /**',
          '     * @brief Gets the',
          '     * @details',
          '     * @return T',
          '     * @throws std::exception on error',
          '     * @const',
          '     */',
          '    T get() const;',
          '};'
        )
      );
    });

    it('should recurse into nested classes', () => {
      const input = source(
        'class Outer {',
        'public:',
        '    struct Inner {',
        '        int value;',
        '    };',
        '    void run();',
        '};'
      );
      const result = scanSource(input);

      expect(result.comments.map(c => [c.kind, c.name])).toEqual([
        ['class', 'Outer'],
        ['class', 'Inner'],
        ['variable', 'value'],
        ['function', 'run'],
      ]);
      expect(result.lines).toContain('        /**\n');
      expect(result.lines).toContain('         * @brief Variable value\n');
    });

    it('should name out-of-class special members after their qualifier', () => {
      const result = scanSource(source('Foo::Foo(const Foo& other) : value_(other.value_) {', '}'));

      expect(result.lines[1]).toBe(' * @brief Copy constructor for Foo\n');
      expect(result.comments).toHaveLength(1);
    });

    it('should leave unrelated assignment operators undocumented', () => {
      const input = source('Foo& Foo::operator=(int v) {', '    value_ = v;', '    return *this;', '}');
      expect(documented(input)).toBe(input);
    });

    it('should not read comments into a signature after a macro line', () => {
      const input = source(
        'class W : public QObject {',
        '    Q_OBJECT',
        '    /** Runs it */',
        '    int run();',
        '};'
      );
      const result = scanSource(input);

      expect(result.lines.slice(5).join('')).toBe(input);
      expect(result.comments.map(c => [c.kind, c.name])).toEqual([['class', 'W']]);
    });

    it('should leave declarations with a comment in their return type alone', () => {
      const input = source('inline /* hot */ int f();');
      const result = scanSource(input);

      expect(result.lines.join('')).toBe(input);
      expect(result.comments).toEqual([]);
    });

    it('should document a member declared on its access marker line', () => {
      const result = scanSource(source('class W {', 'public: void run();', '};'));

      expect(result.comments.map(c => [c.kind, c.name])).toEqual([
        ['class', 'W'],
        ['function', 'run'],
      ]);
      expect(result.lines.slice(5)).toEqual([
        'class W {\n',
        '/**\n',
        ' * @brief Run\n',
        ' * @details\n',
        ' * @throws std::exception on error\n',
        ' */\n',
        'public: void run();\n',
        '};\n',
      ]);
    });

    it('should indent comments like their declarations', () => {
      const input = source('namespace app {', '  struct Config {', '    int retries = 3;', '  };', '}');

      expect(documented(input)).toBe(
        source(
          'namespace app {',
          '  /**',
          '   * @brief struct Config',
          '   *',
          '   * @details Detailed description of struct Config',
          '   */',
          '  struct Config {',
          '    /**',
          '     * @brief Variable retries',
          '     *',
          '     */',
          '    int retries = 3;',
          '  };',
          '}'
        )
      );
    });
  });

  describe('access markers', () => {
    it('should keep a marker exactly once, before the next comment', () => {
      const input = source('class Widget {', 'private:', '    DECLARE_FIELDS(Widget)', '    int count_;', '};');
      const lines = scanSource(input).lines;

      expect(lines.filter(line => line === 'private:\n')).toHaveLength(1);
      expect(lines.indexOf('private:\n')).toBeLessThan(lines.indexOf('    DECLARE_FIELDS(Widget)\n'));
    });

    it('should keep a trailing marker', () => {
      const input = source('class Empty {', 'public:', '};');
      expect(documented(input)).toContain('public:\n};\n');
    });
  });

  describe('existing comments', () => {
    it('should not document a declaration that already has a doc block', () => {
      const input = source('/// Adds numbers.', 'int add(int a, int b);', '', '/**', ' * Runs.', ' */', 'void run();');
      const result = scanSource(input);

      expect(result.lines.join('')).toBe(input);
      expect(result.comments).toEqual([]);
    });

    it('should keep the claim across blank lines', () => {
      const input = source('/** Widget docs. */', '', 'class Widget {', '};');
      expect(documented(input)).toBe(input);
    });

    it('should drop the claim at other code', () => {
      const input = source('/** Macro docs. */', '#define LIMIT 4', 'void run();');

      expect(documented(input)).toBe(
        source(
          '/** Macro docs. */',
          '#define LIMIT 4',
          '',
          '/**',
          ' * @brief Run',
          ' * @details',
          ' * @throws std::exception on error',
          ' */',
          'void run();'
        )
      );
    });

    it('should not let a doc block sharing its line with code claim the next declaration', () => {
      const result = scanSource(source('/** doc */ int x;', 'int y;'));

      expect(result.comments.map(c => [c.name, c.sourceLine])).toEqual([['y', 1]]);
    });

    it('should count braces of code after a closing doc delimiter', () => {
      const result = scanSource(source('/** Widget */ struct Widget {', '  int x;', '};', 'int y;'));

      expect(result.comments.map(c => c.name)).toEqual(['y']);
      expect(result.lines.slice(0, 3).join('')).toBe(source('/** Widget */ struct Widget {', '  int x;', '};'));
    });

    it('should capture existing blocks in enhance mode', () => {
      const input = source('/// Adds numbers.', 'int add(int a, int b);');
      const result = scanSource(input, { enhanceExisting: true });

      expect(result.lines.join('')).toBe(input);
      expect(result.capturedComments).toEqual([
        {
          startLine: 0,
          endLine: 0,
          text: '/// Adds numbers.\n',
          declaration: { kind: 'function', name: 'add' },
        },
      ]);
    });

    it('should capture nothing by default', () => {
      expect(scanSource(source('/// Adds numbers.', 'int add(int a, int b);')).capturedComments).toEqual([]);
    });
  });

  describe('file shape', () => {
    it('should return a single newline for empty input', () => {
      expect(scanSource('').lines).toEqual(['\n']);
    });

    it('should trim trailing blank lines and terminate the last line', () => {
      const expected = source('/**', ' * @brief Variable x', ' *', ' */', 'int x;');

      expect(documented('int x;')).toBe(expected);
      expect(documented('int x;\n\n\n')).toBe(expected);
    });

    it('should write inserted lines with the input line ending', () => {
      expect(documented('void run();\r\n')).toBe(
        '/**\r\n * @brief Run\r\n * @details\r\n * @throws std::exception on error\r\n */\r\nvoid run();\r\n'
      );
    });

    it('should be idempotent', () => {
      const once = documented(MIXED_HEADER);
      expect(documented(once)).toBe(once);
    });

    it('should preserve every input line in order', () => {
      expect(preservesInput(MIXED_HEADER, documented(MIXED_HEADER))).toBe(true);
    });

    it('should document each declaration of a mixed header once', () => {
      const result = scanSource(MIXED_HEADER);

      expect(result.comments.map(c => [c.kind, c.name])).toEqual([
        ['enum', 'Unit'],
        ['class', 'Shape'],
        ['function', 'Shape'],
        ['function', '~Shape'],
        ['function', 'area'],
        ['function', 'resize'],
        ['variable', 'scale_'],
        ['variable', 'count_'],
        ['function', 'area'],
      ]);
      expect(result.isTestFile).toBe(false);
    });

    it('should report where each comment went', () => {
      const result = scanSource(source('int x;', 'int y;'));

      expect(result.comments.map(c => [c.sourceLine, c.outputLine, c.lineCount])).toEqual([
        [0, 0, 4],
        [1, 6, 4],
      ]);
    });
  });

  describe('test files', () => {
    it('should document a Google Test case', () => {
      const input = source('#include <gtest/gtest.h>', '', 'TEST(Suite, Case) { EXPECT_EQ(1,1); }');
      const result = scanSource(input);

      expect(result.isTestFile).toBe(true);
      expect(result.testFramework).toBe('gtest');
      expect(result.lines.join('')).toBe(
        source(
          '#include <gtest/gtest.h>',
          '',
          '/**',
          ' * @brief Tests case',
          ' *',
          ' * @details',
          ' * Test Suite: Suite',
          ' * Framework: Google Test',
          ' *',
          ' * Test Coverage:',
          ' * - Covers equality comparison',
          ' *',
          ' * @test TEST',
          ' */',
          'TEST(Suite, Case) { EXPECT_EQ(1,1); }'
        )
      );
    });

    it('should only document test cases in test files', () => {
      const input = source('#include <gtest/gtest.h>', '', 'int helper(int x);', '', 'TEST(Math, Adds) {', '    EXPECT_EQ(helper(1), 2);', '}');
      const result = scanSource(input);

      expect(result.comments.map(c => [c.kind, c.name])).toEqual([['testCase', 'Adds']]);
    });

    it('should label doctest cases with their suite', () => {
      const output = documented(DOCTEST_FILE);

      expect(output).toContain(
        source(
          'TEST_SUITE("math") {',
          '    /**',
          '     * @brief Tests adds numbers',
          '     *',
          '     * @details',
          '     * Test Suite: math',
          '     * Framework: doctest',
          '     *',
          '     * Test Coverage:',
          '     * - Covers checked conditions',
          '     *',
          '     * @test TEST_CASE',
          '     */',
          '    TEST_CASE("adds numbers") {'
        )
      );
      expect(splitSourceLines(output).filter(line => line.trim() === '* Test Suite: math')).toHaveLength(1);
    });

    it('should close unbraced Boost suites at their end macro', () => {
      const result = scanSource(BOOST_FILE);

      expect(result.testFramework).toBe('boost');
      expect(result.comments.map(c => c.name)).toEqual(['adds_values', 'standalone']);
      expect(result.lines.filter(line => line === ' * Test Suite: arith\n')).toHaveLength(1);
      expect(result.lines).toContain(' * @brief Tests adds values\n');
    });

    it('should document CppUnit methods but not their registrations', () => {
      const input = source(
        '#include <cppunit/extensions/HelperMacros.h>',
        '',
        'class CalcTest : public CppUnit::TestFixture {',
        '    CPPUNIT_TEST_SUITE(CalcTest);',
        '    CPPUNIT_TEST(testAdd);',
        '    CPPUNIT_TEST_SUITE_END();',
        'public:',
        '    void testAdd() {',
        '        CPPUNIT_ASSERT_EQUAL(2, 1 + 1);',
        '    }',
        '};'
      );
      const result = scanSource(input);

      expect(result.comments.map(c => [c.kind, c.name])).toEqual([['testCase', 'testAdd']]);
      expect(result.lines.slice(6, 12)).toEqual([
        'public:\n',
        '    /**\n',
        '     * @brief Tests Add\n',
        '     *\n',
        '     * @details\n',
        '     * Test Suite: CalcTest\n',
      ]);
      expect(result.lines).toContain('     * Test Fixture: CalcTest\n');
      expect(result.lines).toContain('     * @test CPPUNIT_TEST_METHOD\n');
    });

    it('should be idempotent on test files', () => {
      for (const input of [DOCTEST_FILE, BOOST_FILE]) {
        const once = documented(input);
        expect(documented(once)).toBe(once);
      }
    });

    it('should preserve every line of a test file', () => {
      for (const input of [DOCTEST_FILE, BOOST_FILE]) {
        expect(preservesInput(input, documented(input))).toBe(true);
      }
    });

    it('should scan test files as regular code when detection is off', () => {
      const input = source('#include <gtest/gtest.h>', '', 'TEST(Suite, Case) {', '    EXPECT_EQ(1, 1);', '}');
      const result = new StructuralScanner({ detectTestFrameworks: false }).scanText(input);

      expect(result.isTestFile).toBe(false);
      expect(result.comments).toEqual([]);
      expect(result.lines.join('')).toBe(input);
    });
  });
});
