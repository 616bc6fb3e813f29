/**
 * Encode engine tests - in-memory trees
 */

import { describe, it, expect } from 'vitest';
import { decode } from './decode.js';
import { encode } from './encode.js';
import { InvalidRootConfiguration, MissingValue, UserFailure, XmlError } from './errors.js';
import { MemoryGrove, MemoryTreeBuilder } from './grove/index.js';
import type { Hooks } from './hooks.js';
import {
  array,
  boolean,
  dictionary,
  floatingPoint,
  integer,
  namedTuple,
  string,
  userObject,
  type Processor,
} from './processor.js';

function toXml(processor: Processor, value: unknown): string {
  return encode(processor, value, new MemoryTreeBuilder()).toXml();
}

function errorOf(body: () => unknown): unknown {
  try {
    body();
  } catch (error) {
    return error;
  }
  throw new Error('Expected an error');
}

const bookProcessor = dictionary('book', [string('title'), integer('year-published')]);

const authorProcessor = dictionary('author', [
  string('name'),
  integer('birth-year'),
  array(bookProcessor, { nested: 'books' }),
]);

const frost = {
  name: 'Robert Frost',
  'birth-year': 1874,
  books: [
    { title: 'A Boy\'s Will', 'year-published': 1913 },
    { title: 'North of Boston', 'year-published': 1914 },
  ],
};

describe('encode - dictionaries and primitives', () => {
  it('should write children in declaration order', () => {
    expect(toXml(authorProcessor, frost)).toBe(
      '<author><name>Robert Frost</name><birth-year>1874</birth-year>' +
        '<books><book><title>A Boy\'s Will</title><year-published>1913</year-published></book>' +
        '<book><title>North of Boston</title><year-published>1914</year-published></book></books></author>'
    );
  });

  it('should serialize each primitive type', () => {
    const processor = dictionary('reading', [boolean('valid'), integer('count'), floatingPoint('value'), string('unit')]);
    expect(toXml(processor, { valid: false, count: 12, value: 0.25, unit: 'kPa' })).toBe(
      '<reading><valid>false</valid><count>12</count><value>0.25</value><unit>kPa</unit></reading>'
    );
  });

  it('should ignore keys without a processor', () => {
    const processor = dictionary('user', [string('name')]);
    expect(toXml(processor, { name: 'sam', password: 'test-secret' })).toBe('<user><name>sam</name></user>');
  });

  it('should write slash paths through shared elements', () => {
    const processor = dictionary('place', [string('location/city'), floatingPoint('location/lat')]);
    expect(toXml(processor, { city: 'Lisbon', lat: 38.72 })).toBe(
      '<place><location><city>Lisbon</city><lat>38.72</lat></location></place>'
    );
  });

  it('should nest a root path below the document element', () => {
    const processor = dictionary('root/inner', [integer('x')]);
    expect(toXml(processor, { x: 1 })).toBe('<root><inner><x>1</x></inner></root>');
  });

  it('should read values by alias', () => {
    const processor = dictionary('author', [string('name', { alias: 'fullName' })]);
    expect(toXml(processor, { fullName: 'Jane', name: 'ignored' })).toBe('<author><name>Jane</name></author>');
  });

  it('should escape markup characters', () => {
    const processor = dictionary('note', [string('.', { attribute: 'title' }), string('body')]);
    expect(toXml(processor, { title: 'say "hi"', body: 'a & b <c>' })).toBe(
      '<note title="say &quot;hi&quot;"><body>a &amp; b &lt;c&gt;</body></note>'
    );
  });
});

describe('encode - attributes and self paths', () => {
  it('should put attributes on the element or a shared child', () => {
    const processor = dictionary('city', [
      string('.', { attribute: 'name' }),
      floatingPoint('location', { attribute: 'lat' }),
      floatingPoint('location', { attribute: 'lon' }),
    ]);
    expect(toXml(processor, { name: 'Kyoto', lat: 35, lon: 135.75 })).toBe(
      '<city name="Kyoto"><location lat="35" lon="135.75"/></city>'
    );
  });

  it('should write text and attributes on the same item element', () => {
    const processor = array(
      dictionary('value', [string('.', { attribute: 'key' }), integer('.', { alias: 'amount' })]),
      { nested: 'values' }
    );
    expect(toXml(processor, [{ key: 'a', amount: 17 }, { key: 'b', amount: 42 }])).toBe(
      '<values><value key="a">17</value><value key="b">42</value></values>'
    );
  });

  it('should write a self dictionary onto its parent', () => {
    const processor = dictionary('file', [
      dictionary('.', [string('.', { attribute: 'name' }), integer('.', { attribute: 'size' })], { alias: 'meta' }),
      string('owner'),
    ]);
    expect(toXml(processor, { meta: { name: 'a.txt', size: 236 }, owner: 'sam' })).toBe(
      '<file name="a.txt" size="236"><owner>sam</owner></file>'
    );
  });
});

describe('encode - optional values', () => {
  const userProcessor = dictionary('user', [
    string('name'),
    string('email', { required: false }),
    integer('age', { required: false, default: 18 }),
    string('nick', { required: false, omitEmpty: true }),
    string('note', { required: false, default: 'n/a', omitEmpty: true }),
  ]);

  it('should skip absent values, write defaults and omit empty values', () => {
    expect(toXml(userProcessor, { name: 'sam', email: null, nick: '' })).toBe(
      '<user><name>sam</name><age>18</age></user>'
    );
  });

  it('should write present values', () => {
    expect(toXml(userProcessor, { name: 'sam', email: 'sam@example.com', age: 40, nick: 'S', note: 'hi' })).toBe(
      '<user><name>sam</name><email>sam@example.com</email><age>40</age><nick>S</nick><note>hi</note></user>'
    );
  });

  it('should keep empty values without omitEmpty', () => {
    const processor = dictionary('user', [string('nick', { required: false }), integer('score', { required: false })]);
    expect(toXml(processor, { nick: '', score: 0 })).toBe('<user><nick/><score>0</score></user>');
  });

  it('should skip an absent optional aggregate', () => {
    const processor = dictionary('user', [string('name'), dictionary('address', [string('street')], { required: false })]);
    expect(toXml(processor, { name: 'sam' })).toBe('<user><name>sam</name></user>');
  });

  it('should report a missing required value with its location', () => {
    const error = errorOf(() => toXml(authorProcessor, { name: 'Robert Frost', books: [] }));
    expect(error).toBeInstanceOf(MissingValue);
    expect(error instanceof MissingValue && error.message).toBe('Missing required value "birth-year" at author/birth-year');
  });

  it('should report a missing required aggregate', () => {
    const processor = dictionary('user', [dictionary('address', [string('street')])]);
    expect(() => toXml(processor, {})).toThrow('Missing required aggregate "address" at user/address');
  });
});

describe('encode - arrays', () => {
  it('should write embedded items directly into the parent', () => {
    const processor = dictionary('shelf', [array(string('title')), string('label')]);
    expect(toXml(processor, { title: ['One', 'Two'], label: 'fiction' })).toBe(
      '<shelf><title>One</title><title>Two</title><label>fiction</label></shelf>'
    );
  });

  it('should write nested items into their container', () => {
    const processor = dictionary('shelf', [array(string('title'), { nested: 'titles' })]);
    expect(toXml(processor, { titles: ['One', 'Two'] })).toBe(
      '<shelf><titles><title>One</title><title>Two</title></titles></shelf>'
    );
  });

  it('should write arrays of arrays', () => {
    const processor = array(array(integer('cell'), { nested: 'row' }), { nested: 'matrix' });
    expect(toXml(processor, [[1, 2], [3]])).toBe(
      '<matrix><row><cell>1</cell><cell>2</cell></row><row><cell>3</cell></row></matrix>'
    );
  });

  it('should keep the container of an empty optional array unless omitEmpty', () => {
    const kept = dictionary('shelf', [array(string('tag'), { nested: 'tags', required: false })]);
    const omitted = dictionary('shelf', [array(string('tag'), { nested: 'tags', required: false, omitEmpty: true })]);
    expect(toXml(kept, { tags: [] })).toBe('<shelf><tags/></shelf>');
    expect(toXml(omitted, { tags: [] })).toBe('<shelf/>');
  });

  it('should reject an empty required array', () => {
    const processor = dictionary('shelf', [array(string('tag'))]);
    expect(() => toXml(processor, { tag: [] })).toThrow('Missing required array "tag" at shelf');
  });

  it('should write an empty element for an absent optional item', () => {
    const processor = array(string('tag', { required: false }), { nested: 'tags' });
    expect(toXml(processor, ['a', null, 'c'])).toBe('<tags><tag>a</tag><tag/><tag>c</tag></tags>');
  });

  it('should write the default for an absent item', () => {
    const processor = array(integer('n', { required: false, default: 0 }), { nested: 'ns' });
    expect(toXml(processor, [1, null])).toBe('<ns><n>1</n><n>0</n></ns>');
  });

  it('should reject an absent required item with the item location', () => {
    const processor = array(integer('n'), { nested: 'ns' });
    expect(() => toXml(processor, [1, undefined])).toThrow('Missing required value "n" at ns/n[1]');
  });
});

describe('encode - value shapes', () => {
  it('should reject a non-mapping for a dictionary', () => {
    const error = errorOf(() => toXml(authorProcessor, 'Robert Frost'));
    expect(error).toBeInstanceOf(XmlError);
    expect(error instanceof XmlError && error.message).toBe('Expected a mapping for "author" at author');
  });

  it('should reject a non-array for an array', () => {
    expect(() => toXml(authorProcessor, { ...frost, books: 'none' })).toThrow('Expected an array for "books" at author/books');
  });

  it('should reject a primitive root processor', () => {
    expect(() => toXml(integer('n'), 1)).toThrow(InvalidRootConfiguration);
  });
});

describe('encode - records', () => {
  class Point {
    x = 0;
    y = 0;
  }

  it('should read fields from user objects', () => {
    const processor = userObject('point', Point, [integer('x'), integer('y')]);
    const point = new Point();
    point.x = 3;
    point.y = 4;
    expect(toXml(processor, point)).toBe('<point><x>3</x><y>4</y></point>');
  });

  it('should read fields from named tuples', () => {
    const processor = namedTuple('point', ['x', 'y'], [integer('x', { alias: 'x' }), integer('.', { attribute: 'y' })]);
    expect(toXml(processor, Object.freeze({ x: 3, y: 4 }))).toBe('<point y="4"><x>3</x></point>');
  });

  it('should reject a scalar for a record', () => {
    const processor = userObject('point', Point, [integer('x')]);
    expect(() => toXml(processor, 7)).toThrow('Expected an object for "point" at point');
  });
});

describe('encode - hooks', () => {
  it('should call hooks before children, with their locations', () => {
    const seen: string[] = [];
    const hooks: Hooks = {
      beforeEncode: (state, value) => {
        seen.push(state.location);
        return value;
      },
    };
    const processor = dictionary('data', [
      dictionary('user', [string('name', { hooks })], { hooks }),
      array(integer('value', { hooks }), { nested: 'values', hooks }),
      array(string('tag', { hooks }), { hooks }),
    ], { hooks });

    toXml(processor, { user: { name: 'sam' }, values: [1, 2], tag: ['x'] });

    expect(seen).toEqual([
      'data',
      'data/user',
      'data/user/name',
      'data/values',
      'data/values/value[0]',
      'data/values/value[1]',
      'data',
      'data/tag[0]',
    ]);
  });

  it('should encode the hook\'s return value', () => {
    const processor = dictionary('data', [
      string('name', { hooks: { beforeEncode: (_state, value) => typeof value === 'string' ? value.toLowerCase() : value } }),
      array(integer('value'), {
        nested: 'values',
        hooks: { beforeEncode: (_state, value) => Array.isArray(value) ? [...value].reverse() : value },
      }),
    ]);
    expect(toXml(processor, { name: 'SAM', values: [1, 2] })).toBe(
      '<data><name>sam</name><values><value>2</value><value>1</value></values></data>'
    );
  });

  it('should attach the location to errors a hook throws itself', () => {
    const processor = dictionary('author', [
      string('name', {
        hooks: {
          beforeEncode: () => {
            throw new MissingValue('nope');
          },
        },
      }),
    ]);

    const error = errorOf(() => toXml(processor, { name: 'Jane' }));
    expect(error).toBeInstanceOf(MissingValue);
    expect(error instanceof MissingValue && error.location).toBe('author/name');
    expect(error instanceof MissingValue && error.message).toBe('nope at author/name');
  });

  it('should raise hook failures with the item location', () => {
    const processor = array(integer('value', {
      hooks: {
        beforeEncode: (state, value) => {
          if (typeof value === 'number' && value > 9) {
            state.raiseError();
          }
          return value;
        },
      },
    }), { nested: 'values' });

    const error = errorOf(() => toXml(processor, [1, 10]));
    expect(error).toBeInstanceOf(UserFailure);
    expect(error instanceof UserFailure && error.message).toBe('Invalid value at values/value[1]');
  });
});

describe('encode then decode', () => {
  it('should reproduce the original value', () => {
    const root = encode(authorProcessor, frost, new MemoryTreeBuilder());
    expect(decode(authorProcessor, new MemoryGrove(root))).toEqual(frost);
  });

  it('should read absent optional string items back as empty strings', () => {
    const processor = dictionary('data', [
      array(string('tag', { required: false }), { nested: 'tags' }),
      floatingPoint('ratio', { required: false }),
    ]);
    const root = encode(processor, { tags: ['a', null] }, new MemoryTreeBuilder());
    expect(decode(processor, new MemoryGrove(root))).toEqual({ tags: ['a', ''], ratio: null });
  });

  it('should reproduce embedded arrays and self attribute groups', () => {
    const processor = dictionary('library', [
      string('.', { attribute: 'name' }),
      array(dictionary('shelf', [
        dictionary('.', [string('.', { attribute: 'label' }), integer('.', { attribute: 'level' })], { alias: 'meta' }),
        array(string('title')),
      ])),
    ]);
    const value = {
      name: 'Branch',
      shelf: [
        { meta: { label: 'A', level: 1 }, title: ['One', 'Two'] },
        { meta: { label: 'B', level: 2 }, title: ['Three'] },
      ],
    };
    const root = encode(processor, value, new MemoryTreeBuilder());
    expect(root.toXml()).toBe(
      '<library name="Branch"><shelf label="A" level="1"><title>One</title><title>Two</title></shelf>' +
        '<shelf label="B" level="2"><title>Three</title></shelf></library>'
    );
    expect(decode(processor, new MemoryGrove(root))).toEqual(value);
  });

  it('should reproduce user objects', () => {
    class Book {
      title = '';
      year = 0;
    }
    const processor = userObject('book', Book, [string('title'), integer('year-published', { alias: 'year' })]);
    const book = new Book();
    book.title = 'North of Boston';
    book.year = 1914;

    const decoded = decode(processor, new MemoryGrove(encode(processor, book, new MemoryTreeBuilder())));
    expect(decoded).toBeInstanceOf(Book);
    expect(decoded).toEqual(book);
  });

  it('should reproduce named tuples', () => {
    const processor = array(
      namedTuple('point', ['x', 'y'], [integer('.', { attribute: 'x' }), integer('.', { attribute: 'y' })]),
      { nested: 'points' }
    );
    const points = [Object.freeze({ x: 1, y: 2 }), Object.freeze({ x: -3, y: 0 })];

    const decoded = decode(processor, new MemoryGrove(encode(processor, points, new MemoryTreeBuilder())));
    expect(decoded).toEqual([{ x: 1, y: 2 }, { x: -3, y: 0 }]);
  });

  it('should indent the in-memory dump on request', () => {
    const root = encode(dictionary('user', [string('name')]), { name: 'sam' }, new MemoryTreeBuilder());
    expect(root.toXml('  ')).toBe('<user>\n  <name>sam</name>\n</user>\n');
  });
});
