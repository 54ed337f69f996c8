import { describe, expect, it } from 'vitest';
import type { DataSource } from '@fieldport/core';
import {
  CollectingDiagnosticSink,
  MappingReconciler,
  buildMappingRule,
  formatDiagnostic,
  matchCommonSources,
} from '../src/index.js';
import { InMemoryTargetOrg, v1Field } from './in-memory-orgs.js';

const v1Sources: DataSource[] = [
  { id: 'V1-WEB', name: 'crawler-1' },
  { id: 'v1-legacy', name: 'legacy-only' },
];

describe('matchCommonSources', () => {
  it('pairs sources by case-insensitive name and ignores ids', () => {
    const common = matchCommonSources(
      [
        { id: 'same-id', name: 'Web' },
        { id: 'a', name: 'Docs' },
      ],
      [
        { id: 'x', name: 'web' },
        { id: 'same-id', name: 'Forum' },
      ]
    );

    expect(Array.from(common.values())).toEqual([{ name: 'web', sourceId: 'same-id', targetId: 'x' }]);
  });

  it('is symmetric under case permutation', () => {
    const forward = matchCommonSources([{ id: '1', name: 'Web' }], [{ id: '2', name: 'WEB' }]);
    const backward = matchCommonSources([{ id: '1', name: 'wEB' }], [{ id: '2', name: 'web' }]);

    expect(forward.get('web')).toEqual({ name: 'web', sourceId: '1', targetId: '2' });
    expect(backward.get('web')).toEqual({ name: 'web', sourceId: '1', targetId: '2' });
  });
});

describe('buildMappingRule', () => {
  it('reads the field from its metadata name', () => {
    expect(buildMappingRule(v1Field({ name: 'Region', metadataName: 'geo_region' }))).toEqual({
      content: ['%[geo_region]'],
      field: 'Region',
    });
  });
});

describe('MappingReconciler', () => {
  it('creates one rule per field on the matching target source', async () => {
    const target = new InMemoryTargetOrg([{ id: 'v2-crawler', name: 'Crawler-1' }]);

    const result = await new MappingReconciler().reconcile({
      sourceSources: { sources: v1Sources },
      fields: [
        v1Field({ name: 'Region', sourceId: 'v1-web', metadataName: 'region' }),
        v1Field({ name: 'Owner', sourceId: 'v1-web', metadataName: 'author' }),
      ],
      targetSources: target.sources,
      target,
    });

    expect(target.callsOf('mappingsCommonAdd')).toEqual([
      {
        op: 'mappingsCommonAdd',
        sourceId: 'v2-crawler',
        rebuild: false,
        rule: { content: ['%[region]'], field: 'Region' },
      },
      {
        op: 'mappingsCommonAdd',
        sourceId: 'v2-crawler',
        rebuild: false,
        rule: { content: ['%[author]'], field: 'Owner' },
      },
    ]);
    expect(result.commonSources).toEqual([
      { name: 'crawler-1', sourceId: 'V1-WEB', targetId: 'v2-crawler' },
    ]);
  });

  it('skips a field already mapped on the target source, ignoring case', async () => {
    const target = new InMemoryTargetOrg([{ id: 'v2-crawler', name: 'crawler-1' }], {
      rules: { 'v2-crawler': [{ field: 'region', content: ['%[something_else]'] }] },
    });
    const sink = new CollectingDiagnosticSink();

    const result = await new MappingReconciler({ diagnostics: sink }).reconcile({
      sourceSources: { sources: v1Sources },
      fields: [v1Field({ name: 'Region', sourceId: 'V1-WEB' })],
      targetSources: target.sources,
      target,
    });

    expect(target.callsOf('mappingsCommonAdd')).toEqual([]);
    expect(result.skipped).toEqual([
      { field: 'Region', reason: 'already-mapped', sourceName: 'crawler-1' },
    ]);
    expect(sink.ofKind('mapping-exists').map(formatDiagnostic)).toEqual([
      `SKIPPING MAPPING '{"content":["%[region]"],"field":"Region"}' because it's already present in source 'crawler-1'`,
    ]);
  });

  it('skips fields whose source has no target counterpart', async () => {
    const target = new InMemoryTargetOrg([{ id: 'v2-crawler', name: 'crawler-1' }]);
    const sink = new CollectingDiagnosticSink();

    const result = await new MappingReconciler({ diagnostics: sink }).reconcile({
      sourceSources: { sources: v1Sources },
      fields: [v1Field({ name: 'Archive', sourceId: 'v1-legacy' })],
      targetSources: target.sources,
      target,
    });

    expect(target.callsOf('mappingsCommonAdd')).toEqual([]);
    expect(result.skipped).toEqual([
      { field: 'Archive', reason: 'no-target-source', sourceName: 'legacy-only' },
    ]);
    expect(sink.ofKind('mapping-no-target-source').map(formatDiagnostic)).toEqual([
      "SKIPPING MAPPING for 'Archive' because source 'legacy-only' does not exist in the target organization",
    ]);
  });

  it('skips fields whose source id is unknown or missing', async () => {
    const target = new InMemoryTargetOrg([{ id: 'v2-crawler', name: 'crawler-1' }]);

    const result = await new MappingReconciler().reconcile({
      sourceSources: { sources: v1Sources },
      fields: [
        v1Field({ name: 'Orphan', sourceId: 'deleted-source' }),
        v1Field({ name: 'Global', sourceId: null }),
      ],
      targetSources: target.sources,
      target,
    });

    expect(result.skipped.map((s) => [s.field, s.reason])).toEqual([
      ['Orphan', 'unknown-source'],
      ['Global', 'unknown-source'],
    ]);
    expect(target.callsOf('mappingsCommonAdd')).toEqual([]);
  });

  it('does no mapping work without common sources', async () => {
    const target = new InMemoryTargetOrg([{ id: 'v2-other', name: 'other' }]);
    const sink = new CollectingDiagnosticSink();

    const result = await new MappingReconciler({ diagnostics: sink }).reconcile({
      sourceSources: { sources: v1Sources },
      fields: [v1Field({ name: 'Region', sourceId: 'v1-web' })],
      targetSources: target.sources,
      target,
    });

    expect(target.calls).toEqual([]);
    expect(result).toEqual({ commonSources: [], created: [], skipped: [] });
    expect(sink.diagnostics).toEqual([{ kind: 'no-common-sources' }]);
  });

  it('fetches the rules of each common source exactly once', async () => {
    const target = new InMemoryTargetOrg([
      { id: 'v2-crawler', name: 'crawler-1' },
      { id: 'v2-legacy', name: 'LEGACY-ONLY' },
    ]);

    await new MappingReconciler().reconcile({
      sourceSources: { sources: v1Sources },
      fields: [
        v1Field({ name: 'A', sourceId: 'v1-web' }),
        v1Field({ name: 'B', sourceId: 'v1-web' }),
        v1Field({ name: 'C', sourceId: 'v1-legacy' }),
      ],
      targetSources: target.sources,
      target,
    });

    expect(target.callsOf('mappingsGet')).toEqual([
      { op: 'mappingsGet', sourceId: 'v2-crawler' },
      { op: 'mappingsGet', sourceId: 'v2-legacy' },
    ]);
    expect(target.callsOf('mappingsCommonAdd').map((c) => c.sourceId)).toEqual([
      'v2-crawler',
      'v2-crawler',
      'v2-legacy',
    ]);
  });

  it('does not refresh the existing-rule snapshot within a run', async () => {
    const target = new InMemoryTargetOrg([{ id: 'v2-crawler', name: 'crawler-1' }]);
    const duplicate = v1Field({ name: 'Region', sourceId: 'v1-web' });

    await new MappingReconciler().reconcile({
      sourceSources: { sources: [...v1Sources, { id: 'v1-web-copy', name: 'Crawler-1' }] },
      fields: [duplicate, { ...duplicate, sourceId: 'v1-web-copy' }],
      targetSources: target.sources,
      target,
    });

    expect(target.callsOf('mappingsCommonAdd')).toHaveLength(2);
  });

  it('passes the rebuild option through', async () => {
    const target = new InMemoryTargetOrg([{ id: 'v2-crawler', name: 'crawler-1' }]);

    await new MappingReconciler({ rebuild: true }).reconcile({
      sourceSources: { sources: v1Sources },
      fields: [v1Field({ name: 'Region', sourceId: 'v1-web' })],
      targetSources: target.sources,
      target,
    });

    expect(target.callsOf('mappingsCommonAdd')[0]?.rebuild).toBe(true);
  });

  it('stops at the first failed create', async () => {
    const target = new InMemoryTargetOrg([{ id: 'v2-crawler', name: 'crawler-1' }]);
    target.failOn = 'mappingsCommonAdd';

    await expect(
      new MappingReconciler().reconcile({
        sourceSources: { sources: v1Sources },
        fields: [
          v1Field({ name: 'A', sourceId: 'v1-web' }),
          v1Field({ name: 'B', sourceId: 'v1-web' }),
        ],
        targetSources: target.sources,
        target,
      })
    ).rejects.toThrow('mappingsCommonAdd failed');
    expect(target.callsOf('mappingsCommonAdd')).toHaveLength(1);
  });
});
