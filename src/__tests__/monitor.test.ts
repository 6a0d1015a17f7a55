import { describe, it, expect, jest, beforeEach, afterEach } from '@jest/globals';
import { MonitorDeps, runMonitorOnce } from '../monitor.js';
import * as pageCheck from '../pageCheck.js';
import type { MonitorConfig } from '../types.js';
import { md5 } from '../utils.js';
import { FakeWiki, makeConfig, MemorySnapshotStore, MemoryStateStore, RecordingSink } from './fixtures.js';

const NOW = new Date('2024-05-01T00:00:00Z');

interface Harness {
  wiki: FakeWiki;
  sink: RecordingSink;
  stateStore: MemoryStateStore;
  snapshotStore: MemorySnapshotStore;
  deps(config: MonitorConfig): MonitorDeps;
}

function harness(): Harness {
  const wiki = new FakeWiki();
  const sink = new RecordingSink();
  const stateStore = new MemoryStateStore();
  const snapshotStore = new MemorySnapshotStore();
  return {
    wiki,
    sink,
    stateStore,
    snapshotStore,
    deps: (config) => ({ config, source: wiki, sink, stateStore, snapshotStore, now: () => NOW }),
  };
}

beforeEach(() => {
  jest.spyOn(console, 'log').mockImplementation(() => {});
  jest.spyOn(console, 'warn').mockImplementation(() => {});
  jest.spyOn(console, 'error').mockImplementation(() => {});
});

afterEach(() => {
  jest.restoreAllMocks();
});

describe('monitored pages', () => {
  const config = makeConfig({ pageNames: ['PageA'] });

  it('announces pages and the change feed on the first run', async () => {
    const h = harness();
    h.wiki.set('PageA', '本文', 't1').set('RecentChanges', '- [[PageA]]', 'r1');

    const report = await runMonitorOnce(h.deps(config));

    expect(report.events.map((e) => e.title)).toEqual([
      '🔔 【PageA】 の通知が設定されました。',
      '🔔 【RecentChanges】 の通知が設定されました。',
    ]);
    expect(h.sink.sent).toHaveLength(1);
    expect(h.stateStore.current).toEqual({
      seen: { 'page/PageA': 't1', 'page/RecentChanges': 'r1' },
      updatedAt: '2024-05-01T00:00:00.000Z',
      contentHashes: { content_PageA: md5('本文'), content_RecentChanges: md5('- [[PageA]]') },
      dynamicMonitoredPages: new Set(),
    });
    expect([...h.snapshotStore.current.keys()].sort()).toEqual(['PageA', 'RecentChanges']);
  });

  it('stays quiet while nothing changes', async () => {
    const h = harness();
    h.wiki.set('PageA', '本文', 't1').set('RecentChanges', '- [[PageA]]', 'r1');

    await runMonitorOnce(h.deps(config));
    const second = await runMonitorOnce(h.deps(config));

    expect(second.events).toEqual([]);
    expect(h.sink.sent).toHaveLength(1);
  });

  it('records the new hash of a comment-only edit without notifying', async () => {
    const h = harness();
    h.wiki.set('PageA', '本文', 't1').set('RecentChanges', '- [[PageA]]', 'r1');
    await runMonitorOnce(h.deps(config));

    h.wiki.set('PageA', '本文\n// memo', 't2');
    const report = await runMonitorOnce(h.deps(config));

    expect(report.events).toEqual([]);
    expect(report.state.contentHashes.content_PageA).toBe(md5('本文\n// memo'));
  });

  it('notifies a content change with a preview', async () => {
    const h = harness();
    h.wiki.set('PageA', '本文', 't1').set('RecentChanges', '- [[PageA]]', 'r1');
    await runMonitorOnce(h.deps(config));

    h.wiki.set('PageA', '本文\n- 新しい予定', 't2');
    const report = await runMonitorOnce(h.deps(config));

    expect(report.events).toEqual([
      {
        title: '📝 【PageA】 が更新されました。',
        url: 'https://wiki.example/w/?PageA',
        pageName: 'PageA',
        date: 't2',
        diffPreview: '新しい予定',
        isInitial: false,
      },
    ]);
    expect(report.state.seen['page/PageA']).toBe('t2');
    expect(h.snapshotStore.current.get('PageA')?.content).toBe('本文\n- 新しい予定');
  });

  it('finds changed pages through the change feed', async () => {
    const h = harness();
    h.wiki.set('PageA', '本文', 't1').set('RecentChanges', '- [[Other]]', 'r1');
    await runMonitorOnce(h.deps(config));

    h.wiki.set('PageA', '本文\n- 新しい予定', 't2').set('RecentChanges', '- [[PageA]]\n- [[Other]]', 'r2');
    h.wiki.calls = [];
    const report = await runMonitorOnce(h.deps({ ...config, pollMonitoredPages: false }));

    expect(h.wiki.calls).toEqual(['RecentChanges', 'PageA']);
    expect(report.events.map((e) => e.title)).toEqual(['📝 【PageA】 が更新されました。']);
  });

  it('skips pages that fail to load', async () => {
    const h = harness();
    h.wiki.set('PageA', '本文', 't1').set('PageB', '本文', 't1');
    h.wiki.failing.add('PageB');

    const report = await runMonitorOnce(h.deps(makeConfig({ pageNames: ['PageA', 'PageB'] })));

    expect(report.events.map((e) => e.pageName)).toEqual(['PageA']);
    expect(report.skippedPages).toEqual(['PageB', 'RecentChanges']);
    expect(report.state.contentHashes).not.toHaveProperty('content_PageB');
  });

  it('handles a rewrite of a very large page', async () => {
    const h = harness();
    const bigConfig = makeConfig({ pageNames: ['Big'] });
    const lines = (prefix: string) => Array.from({ length: 5000 }, (_, i) => `${prefix} line ${i}`).join('\n');
    h.wiki.set('Big', lines('old'), 't1');
    await runMonitorOnce(h.deps(bigConfig));

    h.wiki.set('Big', lines('new'), 't2');
    const report = await runMonitorOnce(h.deps(bigConfig));

    expect(report.events.map((e) => e.diffPreview)).toEqual(['new line 0']);
    expect(report.state.contentHashes.content_Big).toBe(md5(lines('new')));
    expect(h.snapshotStore.current.get('Big')?.content).toBe(lines('new'));
  });

  it('skips a page whose evaluation fails and carries on', async () => {
    const h = harness();
    h.wiki.set('PageA', '本文', 't1').set('PageB', '本文', 't1');
    const evaluate = pageCheck.evaluatePage;
    jest.spyOn(pageCheck, 'evaluatePage').mockImplementation((...args: Parameters<typeof evaluate>) => {
      if (args[0] === 'PageB') throw new Error('bad markup');
      return evaluate(...args);
    });

    const report = await runMonitorOnce(h.deps(makeConfig({ pageNames: ['PageA', 'PageB'] })));

    expect(report.events.map((e) => e.pageName)).toEqual(['PageA']);
    expect(report.skippedPages).toEqual(['PageB', 'RecentChanges']);
    expect(report.state.contentHashes).not.toHaveProperty('content_PageB');
    expect(console.error).toHaveBeenCalledWith("[MONITOR] Failed to evaluate 'PageB':", 'bad markup');
  });

  it('saves nothing when delivery fails', async () => {
    const h = harness();
    h.wiki.set('PageA', '本文', 't1');
    h.sink.fail = true;

    await expect(runMonitorOnce(h.deps(config))).rejects.toThrow('webhook down');
    expect(h.stateStore.saves).toBe(0);
    expect(h.snapshotStore.saves).toBe(0);
  });

  it('starts from empty state when the stored state cannot be read', async () => {
    const h = harness();
    h.wiki.set('PageA', '本文', 't1');
    h.stateStore.loadResult = { ok: false, error: { source: 'state.json', reason: 'bad' } };

    const report = await runMonitorOnce(h.deps(config));

    expect(report.events.map((e) => e.isInitial)).toEqual([true]);
    expect(console.warn).toHaveBeenCalledWith('[STORE] Failed to load state (state.json: bad); starting empty');
  });
});

describe('recently created pages', () => {
  const config = makeConfig({ monitorRecentCreated: true, autoTrackPatterns: ['Event/.*'] });

  function seedFirstRun(h: Harness): void {
    h.wiki
      .set('RecentCreated', '- [[Event/1]]\n- [[Event/2]]\n- [[Misc]]', 'c1')
      .set('Event/1', '* 開催中\n本文', 'e1')
      .set('Event/2', '* 【終了】 イベント', 'e2');
  }

  it('tracks matching open pages on the first run', async () => {
    const h = harness();
    seedFirstRun(h);

    const report = await runMonitorOnce(h.deps(config));

    expect(report.events).toEqual([
      {
        title: '🔔 ページが1件 通知登録されました',
        url: 'https://wiki.example/w',
        pageName: 'RecentCreated',
        date: 'c1',
        diffPreview: '・Event/1',
        isInitial: false,
      },
      {
        title: '🔔 【RecentCreated】 の通知が設定されました。',
        url: 'https://wiki.example/w/?RecentCreated',
        pageName: 'RecentCreated',
        date: 'c1',
        diffPreview: null,
        isInitial: true,
      },
    ]);
    expect(report.autoTrackedPages).toEqual(['Event/1']);
    expect(h.wiki.calls).not.toContain('Misc');
    expect(report.state.dynamicMonitoredPages).toEqual(new Set(['Event/1']));
    expect(report.state.seen).toEqual({ 'page/Event/1': 'e1', 'page/RecentCreated': 'c1' });
  });

  it('lists new pages and tracks the matching ones', async () => {
    const h = harness();
    seedFirstRun(h);
    await runMonitorOnce(h.deps(config));

    h.wiki
      .set('RecentCreated', '- [[Event/3]]\n- [[Event/1]]\n- [[Event/2]]\n- [[Misc]]', 'c2')
      .set('Event/3', '本文', 'e3');
    const report = await runMonitorOnce(h.deps(config));

    expect(report.events.map((e) => [e.title, e.diffPreview])).toEqual([
      ['🆕 ページが1件 新規作成されました', '・Event/3'],
      ['🔔 ページが1件 通知登録されました', '・Event/3'],
    ]);
    expect(report.state.dynamicMonitoredPages).toEqual(new Set(['Event/1', 'Event/3']));
  });

  it('stops tracking a page once it is closed', async () => {
    const h = harness();
    h.stateStore.current = {
      seen: { 'page/Event/1': 'e1' },
      updatedAt: null,
      contentHashes: { 'content_Event/1': md5('old') },
      dynamicMonitoredPages: new Set(['Event/1']),
    };
    h.snapshotStore.current.set('Event/1', { pageName: 'Event/1', content: 'old', timestamp: 'e1', diff: null });
    h.wiki.set('Event/1', '* 【終了】 イベント\n終わりました', 'e2');

    const report = await runMonitorOnce(h.deps(makeConfig()));

    expect(report.events.map((e) => e.diffPreview)).toEqual(['【終了】 イベント']);
    expect(report.state.dynamicMonitoredPages.size).toBe(0);
    expect(report.state.contentHashes).toEqual({});
    expect(h.snapshotStore.current.size).toBe(0);
  });
});
