import { describe, it, expect } from 'vitest';
import { extractReferences, readScalar } from '../../src/pinning/extractor';
import { classifyAction, classifyImage } from '../../src/pinning/references';

const SHA = 'b4ffde65f46336ab88eb53be808477a3936bae11';
const DIGEST = `sha256:${'ab12'.repeat(16)}`;

describe('classification', () => {
  it.each([
    ['actions/checkout@v4', 'floatingTag'],
    [`actions/checkout@${SHA}`, 'pinned'],
    [`github/codeql-action/init@${SHA}`, 'pinned'],
    ['./.github/actions/build', 'localPath'],
    ['.github/actions/build', 'localPath'],
    ['docker://alpine:3.19', 'floatingTag'],
    [`docker://alpine:3.19@${DIGEST}`, 'pinned'],
    ['actions/checkout', 'malformed'],
    ['actions/checkout@', 'malformed'],
    ['${{ matrix.action }}', 'malformed'],
    ['', 'malformed'],
  ])('classifies uses %s as %s', (value, status) => {
    expect(classifyAction(value).status).toBe(status);
  });

  it.each([
    ['node:20', 'floatingTag'],
    ['redis', 'floatingTag'],
    [`postgres:16@${DIGEST}`, 'pinned'],
    ['postgres:16@sha256:abc', 'malformed'],
    ['${{ inputs.image }}', 'malformed'],
  ])('classifies image %s as %s', (value, status) => {
    expect(classifyImage(value).status).toBe(status);
  });

  it('explains a floating action ref', () => {
    expect(classifyAction('actions/setup-node@main').reason).toBe('ref "main" is not a 40-character commit SHA');
  });
});

describe('readScalar', () => {
  it('splits off a trailing comment', () => {
    const line = '      - uses: actions/checkout@v4 # checkout';
    const scalar = readScalar(line, 13);
    expect(scalar.value).toBe('actions/checkout@v4');
    expect(line.slice(scalar.layout.valueStart, scalar.layout.valueEnd)).toBe('actions/checkout@v4');
    expect(scalar.layout.comment).toBe('# checkout');
  });

  it('unquotes values and keeps a hash inside the quotes', () => {
    const scalar = readScalar('image: "registry.example.com/app:1#2"', 6);
    expect(scalar.value).toBe('registry.example.com/app:1#2');
    expect(scalar.layout.quote).toBe('"');
    expect(scalar.layout.comment).toBeUndefined();
  });
});

describe('extractReferences', () => {
  const workflow = [
    'name: ci',
    'on: push',
    'jobs:',
    '  build:',
    '    runs-on: ubuntu-latest',
    '    container:',
    '      image: node:20',
    '',
    '      # comments and blank lines keep the block open',
    '      options: --cpus 2',
    '    services:',
    '      redis:',
    '        image: "redis:7"',
    '      db: { image: postgres:16, ports: ["5432:5432"] }',
    '    steps:',
    '      - uses: actions/checkout@v4 # checkout',
    `      - uses: actions/setup-node@${SHA}`,
    '      - name: local',
    '        uses: ./.github/actions/build',
    '      - run: echo "image: not-a-reference"',
    '      - with:',
    '          image: also-not-a-reference',
    '  lint:',
    '    container: golang:1.22',
    '  test:',
    '    container: { image: python:3.12 }',
    '    steps:',
    '      - uses: docker://alpine:3.19',
  ].join('\n');

  const references = extractReferences(workflow, 'ci.yml');

  it('finds every uses, container and service reference with its line', () => {
    expect(references.map((ref) => [ref.lineNumber, ref.kind, ref.rawValue, ref.pinStatus])).toEqual([
      [7, 'containerImage', 'node:20', 'floatingTag'],
      [13, 'serviceImage', 'redis:7', 'floatingTag'],
      [14, 'serviceImage', 'postgres:16', 'floatingTag'],
      [16, 'action', 'actions/checkout@v4', 'floatingTag'],
      [17, 'action', `actions/setup-node@${SHA}`, 'pinned'],
      [19, 'action', './.github/actions/build', 'localPath'],
      [24, 'containerImage', 'golang:1.22', 'floatingTag'],
      [26, 'containerImage', 'python:3.12', 'floatingTag'],
      [28, 'action', 'docker://alpine:3.19', 'floatingTag'],
    ]);
  });

  it('records the line layout needed to rewrite in place', () => {
    const checkout = references[3];
    expect(checkout.layout).toEqual({ valueStart: 14, valueEnd: 33, quote: '', comment: '# checkout' });

    const flow = references[2];
    const line = '      db: { image: postgres:16, ports: ["5432:5432"] }';
    expect(line.slice(flow.layout.valueStart, flow.layout.valueEnd)).toBe('postgres:16');
  });

  it('closes a block at a line indented at or left of its key', () => {
    const text = ['    container:', '      image: node:20', '    image: outside', '  other:', '      image: also-outside'].join('\n');
    expect(extractReferences(text, 'x.yml').map((ref) => ref.rawValue)).toEqual(['node:20']);
  });

  it('reports an empty uses value as malformed', () => {
    const [reference] = extractReferences('steps:\n  - uses:\n', 'x.yml');
    expect(reference.pinStatus).toBe('malformed');
    expect(reference.reason).toBe('empty uses value');
  });
});
