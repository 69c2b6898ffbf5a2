import { describe, it, expect } from 'vitest'
import { parseTemplate, parseControlTag, parseForHeader, describeNode, TemplateScanner } from './parser'

describe('parseTemplate', () => {
  it('should split text and expressions', () => {
    expect(parseTemplate('Hi {{ name }}!')).toEqual([
      { type: 'text', content: 'Hi ', offset: 0 },
      { type: 'expression', content: ' name ', offset: 3 },
      { type: 'text', content: '!', offset: 13 },
    ])
  })

  it('should return no nodes for an empty template', () => {
    expect(parseTemplate('')).toEqual([])
  })

  it('should read comments up to the first closer', () => {
    expect(parseTemplate('a{# c #}b')).toEqual([
      { type: 'text', content: 'a', offset: 0 },
      { type: 'comment', content: ' c ', offset: 1 },
      { type: 'text', content: 'b', offset: 8 },
    ])
  })

  it('should classify control tags and keep their trimmed content', () => {
    expect(parseTemplate('{%  for  k , v in  items %}')).toEqual([
      { type: 'control', kind: 'for', expression: 'k, v in items', content: 'for  k , v in  items', offset: 0 },
    ])
  })

  it('should ignore closers inside quoted strings', () => {
    expect(parseTemplate('{{ "a}}b" }} world')).toEqual([
      { type: 'expression', content: ' "a}}b" ', offset: 0 },
      { type: 'text', content: ' world', offset: 12 },
    ])
  })

  it('should ignore openers inside quoted strings', () => {
    expect(parseTemplate('{{ "a{{b" }} world')).toEqual([
      { type: 'expression', content: ' "a{{b" ', offset: 0 },
      { type: 'text', content: ' world', offset: 12 },
    ])
  })

  it('should count nested delimiters of the same family', () => {
    expect(parseTemplate('{{ x {{ y }} }}.')).toEqual([
      { type: 'expression', content: ' x {{ y }} ', offset: 0 },
      { type: 'text', content: '.', offset: 15 },
    ])
  })

  it('should keep an unclosed tag as text up to the next opener', () => {
    const reported: Array<[string, number]> = []
    const nodes = parseTemplate('a {{ b c {% if x %}y{% endif %}', {
      onMalformed: (opener, offset) => reported.push([opener, offset]),
    })

    expect(nodes.map((node) => node.type)).toEqual(['text', 'text', 'control', 'text', 'control'])
    expect(nodes[1]).toEqual({ type: 'text', content: '{{ b c ', offset: 2 })
    expect(nodes[2]).toMatchObject({ kind: 'if', expression: 'x', offset: 9 })
    expect(reported).toEqual([['{{', 2]])
  })

  it('should keep an unclosed comment as text', () => {
    expect(parseTemplate('x {# note')).toEqual([
      { type: 'text', content: 'x ', offset: 0 },
      { type: 'text', content: '{# note', offset: 2 },
    ])
  })

  it('should treat an unterminated quote as an unclosed tag', () => {
    expect(parseTemplate("{{ 'abc }}")).toEqual([{ type: 'text', content: "{{ 'abc }}", offset: 0 }])
  })

  it('should freeze the node list', () => {
    const nodes = parseTemplate('a{{ b }}')
    expect(Object.isFrozen(nodes)).toBe(true)
    expect(Object.isFrozen(nodes[1])).toBe(true)
  })
})

describe('TemplateScanner', () => {
  it('should yield one node per call', () => {
    const scanner = new TemplateScanner('a{{ b }}')
    expect(scanner.next()).toEqual({ type: 'text', content: 'a', offset: 0 })
    expect(scanner.next()).toEqual({ type: 'expression', content: ' b ', offset: 1 })
    expect(scanner.next()).toBeUndefined()
    expect(scanner.next()).toBeUndefined()
  })
})

describe('parseControlTag', () => {
  it('should recognise keywords case-insensitively', () => {
    expect(parseControlTag('IF x > 1')).toEqual({ kind: 'if', expression: 'x > 1' })
    expect(parseControlTag('elif y')).toEqual({ kind: 'elif', expression: 'y' })
    expect(parseControlTag('else')).toEqual({ kind: 'else', expression: '' })
    expect(parseControlTag('endfor')).toEqual({ kind: 'endfor', expression: '' })
  })

  it('should report missing conditions', () => {
    expect(parseControlTag('if')).toEqual({
      kind: 'unknown',
      expression: "Error parsing tag 'if': if tag requires a condition",
    })
  })

  it('should report arguments on closing tags', () => {
    expect(parseControlTag('else x')).toEqual({
      kind: 'unknown',
      expression: "Error parsing tag 'else x': else tag does not take arguments",
    })
  })

  it('should report malformed for headers', () => {
    expect(parseControlTag('for x').expression).toBe(
      "Error parsing tag 'for x': for tag requires 'in', e.g. {% for item in items %}"
    )
    expect(parseControlTag('for 1x in y').expression).toBe("Error parsing tag 'for 1x in y': invalid loop variable '1x'")
    expect(parseControlTag('for a, b, c in d').expression).toBe(
      "Error parsing tag 'for a, b, c in d': cannot unpack into 3 loop variables"
    )
  })

  it('should keep unrecognised tags as unknown', () => {
    expect(parseControlTag('set x = 1')).toEqual({ kind: 'unknown', expression: 'set x = 1' })
    expect(parseControlTag('')).toEqual({ kind: 'unknown', expression: "Error parsing tag '': empty control tag" })
  })
})

describe('parseForHeader', () => {
  it('should split targets and collection', () => {
    expect(parseForHeader('item in items')).toEqual({ targets: ['item'], collection: 'items' })
    expect(parseForHeader('k, v in config.items')).toEqual({ targets: ['k', 'v'], collection: 'config.items' })
  })

  it('should keep later in keywords in the collection', () => {
    expect(parseForHeader('x in a if x in b')).toEqual({ targets: ['x'], collection: 'a if x in b' })
  })

  it('should throw on a malformed header', () => {
    expect(() => parseForHeader('x in')).toThrow("MalformedControlTag: for tag requires 'in'")
  })
})

describe('describeNode', () => {
  it('should reproduce the tag as written', () => {
    const nodes = parseTemplate('t{{ a }}{%  if b %}{# c #}')
    expect(nodes.map(describeNode)).toEqual(['t', '{{ a }}', '{% if b %}', '{# c #}'])
  })
})
