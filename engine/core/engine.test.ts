import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest'
import { TemplateEngine, TemplateError, renderTemplate, evaluateExpression } from './index'
import { int, str, stringify, callable } from './values'
import type { Value, NativeObject } from '../types'

function renderError(engine: TemplateEngine, template: string, context: Record<string, unknown> = {}): TemplateError {
  try {
    engine.render(template, context)
  } catch (error) {
    if (error instanceof TemplateError) return error
    throw error
  }
  throw new Error(`expected '${template}' to fail`)
}

describe('TemplateEngine', () => {
  let engine: TemplateEngine

  beforeEach(() => {
    engine = new TemplateEngine()
  })

  describe('text and expressions', () => {
    it('should substitute variables', () => {
      expect(engine.render('Hello {{ name | upper }}!', { name: 'ada' })).toBe('Hello ADA!')
    })

    it('should preserve surrounding whitespace exactly', () => {
      expect(engine.render('  {{ 1 }}  \n', {})).toBe('  1  \n')
    })

    it('should drop comments', () => {
      expect(engine.render('a{# hidden #}b')).toBe('ab')
    })

    it('should stringify values', () => {
      expect(engine.render('{{ 1 / 2 }}|{{ 4 / 2 }}|{{ true }}|{{ None }}|{{ [1, "a"] }}')).toBe("0.5|2.0|True||[1, 'a']")
    })

    it('should render an undefined variable as empty', () => {
      expect(engine.render('Hello {{ name }}!')).toBe('Hello !')
      expect(engine.render('[{{ user.name }}]')).toBe('[]')
    })

    it('should render an undefined variable through a non-rescuing filter as empty', () => {
      expect(engine.render('[{{ missing | upper }}]')).toBe('[]')
    })

    it('should rescue an undefined variable with default', () => {
      expect(engine.render('{{ missing | default("n/a") }}')).toBe('n/a')
    })

    it('should keep unclosed tags as literal text', () => {
      expect(engine.render('a {{ b', { b: 1 })).toBe('a {{ b')
    })
  })

  describe('if blocks', () => {
    const template = '{% if n > 5 %}A{% elif n > 1 %}B{% else %}C{% endif %}'

    it('should take the first matching branch', () => {
      expect(engine.render(template, { n: 3 })).toBe('B')
      expect(engine.render(template, { n: 9 })).toBe('A')
      expect(engine.render(template, { n: 0 })).toBe('C')
    })

    it('should render nothing when no branch matches and there is no else', () => {
      expect(engine.render('[{% if false %}x{% endif %}]')).toBe('[]')
    })

    it('should not evaluate conditions after the chosen branch', () => {
      expect(engine.render('{% if true %}a{% elif missing %}b{% endif %}')).toBe('a')
    })

    it('should fail on an undefined condition variable', () => {
      expect(renderError(engine, '{% if missing %}x{% endif %}').message).toBe(
        "UndefinedVariable: variable 'missing' is undefined (in {% if missing %} at offset 0)"
      )
    })

    it('should render nested blocks', () => {
      expect(engine.render('{% if a %}{% if b %}ab{% else %}a{% endif %}{% endif %}', { a: true, b: false })).toBe('a')
    })
  })

  describe('for blocks', () => {
    it('should expose loop metadata', () => {
      expect(engine.render('{% for x in items %}{{ loop.index }}:{{ x }},{% endfor %}', { items: [10, 20, 30] })).toBe(
        '1:10,2:20,3:30,'
      )
    })

    it('should separate items using loop.last', () => {
      const template = '{% for x in xs %}{{ x }}{% if not loop.last %}, {% endif %}{% endfor %}'
      expect(engine.render(template, { xs: ['a', 'b', 'c'] })).toBe('a, b, c')
    })

    it('should iterate map values or key/value pairs', () => {
      const m = { a: 1, b: 2 }
      expect(engine.render('{% for v in m %}{{ v }}{% endfor %}', { m })).toBe('12')
      expect(engine.render('{% for k, v in m %}{{ k }}={{ v }};{% endfor %}', { m })).toBe('a=1;b=2;')
    })

    it('should unpack pairs from a list', () => {
      expect(engine.render('{% for a, b in pairs %}{{ a }}{{ b }} {% endfor %}', { pairs: [[1, 'x'], [2, 'y']] })).toBe(
        '1x 2y '
      )
    })

    it('should iterate string characters', () => {
      expect(engine.render('{% for c in "ab" %}[{{ c }}]{% endfor %}')).toBe('[a][b]')
    })

    it('should iterate None zero times', () => {
      expect(engine.render('<{% for x in v %}a{% endfor %}>', { v: null })).toBe('<>')
    })

    it('should render nested loops', () => {
      const template = '{% for row in rows %}{% for c in row %}{{ c }}{% endfor %};{% endfor %}'
      expect(engine.render(template, { rows: [[1, 2], [3]] })).toBe('12;3;')
    })

    it('should not leak loop variables', () => {
      expect(engine.render('{% for x in xs %}{% endfor %}{{ x }}', { xs: [1, 2], x: 'outer' })).toBe('outer')
    })

    it('should accept a rescued collection', () => {
      expect(engine.render('[{% for x in nope | default([]) %}-{% endfor %}]')).toBe('[]')
    })

    it('should unpack dict items', () => {
      const template = '{% for k, v in data | items %}{{ k }}={{ v }};{% endfor %}'
      expect(engine.render(template, { data: { a: 1, b: 'x' } })).toBe('a=1;b=x;')
    })

    it('should reject non-iterable collections', () => {
      expect(renderError(engine, '{% for x in 5 %}{% endfor %}').detail).toBe("'int' object is not iterable")
    })

    it('should reject items that cannot be unpacked', () => {
      expect(renderError(engine, '{% for a, b in xs %}{% endfor %}', { xs: [1] }).detail).toBe(
        'cannot unpack int into 2 loop variables'
      )
    })

    it('should fail on an undefined collection', () => {
      expect(renderError(engine, '{% for x in nope %}{% endfor %}').kind).toBe('UndefinedVariable')
    })
  })

  describe('structural errors', () => {
    it('should report an unclosed block', () => {
      expect(renderError(engine, '{% if a %}x', { a: true }).message).toBe(
        'UnclosedBlock: {% if a %} at node 0 is never closed by {% endif %} (in {% if a %} at offset 0)'
      )
    })

    it('should report orphan closing and branch tags', () => {
      expect(renderError(engine, 'x{% endif %}').message).toBe(
        'MalformedControlTag: unexpected {% endif %} without a matching opening tag (in {% endif %} at offset 1)'
      )
      expect(renderError(engine, '{% else %}').kind).toBe('MalformedControlTag')
    })

    it('should report unknown tags', () => {
      expect(renderError(engine, '{% set x = 1 %}').detail).toBe('set x = 1')
    })

    it('should report malformed tags with their diagnostic', () => {
      expect(renderError(engine, '{% for x %}{% endfor %}').detail).toBe(
        "Error parsing tag 'for x': for tag requires 'in', e.g. {% for item in items %}"
      )
    })

    it('should locate errors at the innermost failing node', () => {
      const error = renderError(engine, 'a{% if true %}{{ 1/0 }}{% endif %}')
      expect(error.message).toBe("DivisionByZero: division by zero in '/' (in {{ 1/0 }} at offset 14)")
      expect(error.location).toEqual({ tag: '{{ 1/0 }}', offset: 14, nodeIndex: 2 })
    })

    it('should report expression syntax errors', () => {
      expect(renderError(engine, '{{ 1 + }}').kind).toBe('SyntaxError')
    })
  })

  describe('filter pipelines', () => {
    it('should map a filter over a list', () => {
      expect(engine.render("{{ items | map('upper') | join(' ') }}", { items: ['hello', 'world'] })).toBe('HELLO WORLD')
    })

    it('should fail when mapping an unknown filter', () => {
      expect(renderError(engine, "{{ xs | map('nope') }}", { xs: ['a'] }).message).toBe(
        "UnknownFilter: no filter named 'nope' (in {{ xs | map('nope') }} at offset 0)"
      )
    })

    it('should fail on int overflow instead of losing precision', () => {
      expect(renderError(engine, 'n={{ 2 ** 64 }}').message).toBe(
        'TypeError: integer overflow: 18446744073709552000 is outside the exact integer range (in {{ 2 ** 64 }} at offset 2)'
      )
    })
  })

  describe('nesting limit', () => {
    const template = '{% if true %}{% if true %}{% if true %}x{% endif %}{% endif %}{% endif %}'

    it('should allow nesting up to maxDepth', () => {
      expect(new TemplateEngine({ config: { maxDepth: 3 } }).render(template)).toBe('x')
    })

    it('should fail beyond maxDepth', () => {
      const error = renderError(new TemplateEngine({ config: { maxDepth: 2 } }), template)
      expect(error.kind).toBe('RecursionLimit')
      expect(error.detail).toBe('block nesting exceeds the limit of 2')
    })
  })

  describe('parsed templates', () => {
    it('should render the same nodes repeatedly with the same result', () => {
      const nodes = engine.parse('{% for x in xs %}{{ x * 2 }}{% endfor %}')
      expect(engine.render(nodes, { xs: [1, 2] })).toBe('24')
      expect(engine.render(nodes, { xs: [1, 2] })).toBe('24')
      expect(engine.render(nodes, { xs: [5] })).toBe('10')
    })
  })

  describe('evaluate', () => {
    it('should evaluate a single expression', () => {
      expect(engine.evaluate('a.b + 1', { a: { b: 2 } })).toEqual(int(3))
    })

    it('should fail on undefined variables', () => {
      expect(() => engine.evaluate('missing')).toThrow("UndefinedVariable: variable 'missing' is undefined")
    })

    it('should accept a Map of Values as context', () => {
      const point: NativeObject = { getAttribute: (name) => (name === 'x' ? int(4) : undefined) }
      const context = new Map<string, Value>([['p', { type: 'object', name: 'Point', target: point }]])
      expect(engine.evaluate('p.x * 2', context)).toEqual(int(8))
    })
  })

  describe('host extensions', () => {
    it('should use host filters', () => {
      const custom = new TemplateEngine({
        filters: { shout: { apply: (input) => str(`${stringify(input)}!`) } },
      })
      expect(custom.render('{{ "hi" | shout | upper }}')).toBe('HI!')
    })

    it('should use host functions', () => {
      const custom = new TemplateEngine({
        functions: {
          double: callable('double', ([n]) => int(n !== undefined && n.type === 'int' ? n.value * 2 : 0)),
        },
      })
      expect(custom.render('{{ double(21) }}')).toBe('42')
    })

    it('should use host methods', () => {
      const custom = new TemplateEngine({
        methods: { string: { shout: (receiver) => str(`${stringify(receiver)}!`) } },
      })
      expect(custom.render('{{ name.shout() }}', { name: 'ada' })).toBe('ada!')
    })
  })

  describe('validate', () => {
    it('should check filters against the engine registry', () => {
      const result = engine.validate('{{ x | shout }}')
      expect(result.valid).toBe(false)
      expect(result.errors[0].code).toBe('UNKNOWN_FILTER')
    })
  })
})

describe('warnings', () => {
  beforeEach(() => {
    vi.spyOn(console, 'warn').mockImplementation(() => undefined)
  })

  afterEach(() => {
    vi.restoreAllMocks()
  })

  it('should warn about undefined variables when configured', () => {
    const engine = new TemplateEngine({ config: { warnOnUndefined: true } })
    expect(engine.render('[{{ who }}]')).toBe('[]')
    expect(console.warn).toHaveBeenCalledWith("Undefined variable 'who' rendered as empty in {{ who }}")
  })

  it('should stay quiet by default', () => {
    new TemplateEngine().render('{{ who }}{{ a')
    expect(console.warn).not.toHaveBeenCalled()
  })

  it('should warn about unclosed tags when configured', () => {
    const engine = new TemplateEngine({ config: { warnOnMalformed: true } })
    expect(engine.render('a {{ b')).toBe('a {{ b')
    expect(console.warn).toHaveBeenCalledWith("Unclosed '{{' at offset 2 kept as literal text")
  })
})

describe('renderWithTrace', () => {
  it('should record branches, expressions and undefined variables', () => {
    const engine = new TemplateEngine()
    const { output, trace } = engine.renderWithTrace('{% if a %}{{ a }}{% endif %}{{ b }}', { a: 1 })

    expect(output).toBe('1')
    expect(trace?.root.type).toBe('root')
    expect(trace?.root.output.value).toBe('1')
    expect(trace?.root.children.map((child) => child.type)).toEqual(['conditional', 'expression'])
    expect(trace?.root.children[0].metadata).toEqual({
      type: 'conditional',
      branch: 0,
      evaluated: [{ condition: 'a', matched: true }],
    })
    expect(trace?.stats).toEqual({
      nodeCount: 4,
      maxDepth: 2,
      typeBreakdown: { root: 1, conditional: 1, expression: 2 },
      undefinedVariables: ['b'],
    })
  })

  it('should record loop iterations', () => {
    const engine = new TemplateEngine()
    const { trace } = engine.renderWithTrace('{% for x in xs %}{{ x }}{% endfor %}', { xs: [1, 2] })
    const loop = trace?.root.children[0]

    expect(loop?.metadata).toEqual({ type: 'loop', targets: ['x'], collection: 'xs', iterations: 2 })
    expect(loop?.children.map((child) => child.label)).toEqual(['iteration 1', 'iteration 2'])
  })

  it('should return no trace when disabled', () => {
    const engine = new TemplateEngine()
    expect(engine.renderWithTrace('x', {}, { enableTrace: false })).toEqual({ output: 'x', trace: null })
  })
})

describe('default engine helpers', () => {
  it('should render and evaluate with default settings', () => {
    expect(renderTemplate('{{ a }}-{{ b | default(0) }}', { a: 'x' })).toBe('x-0')
    expect(evaluateExpression('2 ** 3 * 2 + 3')).toEqual(int(19))
  })
})
