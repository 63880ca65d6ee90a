import { describe, expect, it } from 'vitest';
import { ValidationError } from '../src/errors.js';
import { FakeTickTick, TEST_SETTINGS } from './helpers/fakeTickTick.js';
import { openClient } from './helpers/openClient.js';

describe('user and account', () => {
  it('maps the profile', async () => {
    const { client } = await openClient();
    expect(await client.getProfile()).toEqual({
      username: TEST_SETTINGS.username,
      displayName: 'Test User',
      email: TEST_SETTINGS.username,
      locale: 'en_US',
      avatarUrl: undefined,
    });
  });

  it('maps the subscription status', async () => {
    const { fake, client } = await openClient();
    expect(await client.getStatus()).toEqual({
      userId: fake.userId,
      username: TEST_SETTINGS.username,
      inboxId: fake.inboxId,
      isPro: true,
      proEndsAt: '2027-01-01T00:00:00.000Z',
    });
  });

  it('maps statistics onto focus names', async () => {
    const { client } = await openClient();
    expect(await client.getStatistics()).toEqual({
      score: 1200,
      level: 5,
      todayCompleted: 2,
      yesterdayCompleted: 3,
      totalCompleted: 340,
      todayFocusCount: 1,
      totalFocusCount: 90,
      todayFocusDuration: 25,
      totalFocusDuration: 2250,
    });
  });

  it('returns focus minutes per day inside the window', async () => {
    const fake = new FakeTickTick();
    fake.focusDays = [
      { day: '20260227', duration: 10 },
      { day: '20260301', duration: 50 },
      { day: '20260302', duration: 25 },
      { day: '20260310', duration: 5 },
    ];
    const { client } = await openClient(fake);

    const days = await client.getFocusHeatmap({ from: '2026-03-01', to: '2026-03-05' });

    expect(days).toEqual([
      { day: '2026-03-01', minutes: 50 },
      { day: '2026-03-02', minutes: 25 },
    ]);
    expect(fake.calls.map((c) => c.path)).toEqual(['/pomodoros/statistics/heatmap/20260301/20260305']);
  });

  it('returns focus distribution by project and tag', async () => {
    const fake = new FakeTickTick();
    fake.focusDistribution = { projectDurations: { p1: 120 }, tagDurations: { deep: 90 } };
    const { client } = await openClient(fake);

    expect(await client.getFocusDistribution({ from: '2026-03-01', to: '2026-03-01' })).toEqual({
      byProject: { p1: 120 },
      byTag: { deep: 90 },
    });
  });

  it('rejects an inverted or malformed window before calling out', async () => {
    const { fake, client } = await openClient();

    await expect(client.getFocusHeatmap({ from: '2026-03-05', to: '2026-03-01' })).rejects.toBeInstanceOf(ValidationError);
    await expect(client.getFocusDistribution({ from: '2026-02-30', to: '2026-03-01' })).rejects.toBeInstanceOf(
      ValidationError,
    );
    expect(fake.calls).toEqual([]);
  });

  it('returns the raw snapshot from a full sync', async () => {
    const fake = new FakeTickTick();
    fake.addProject({ id: 'p1', name: 'Work' });
    fake.addTask({ id: 't1', title: 'Draft', projectId: 'p1' });
    const { client } = await openClient(fake);

    const snapshot = await client.fullSync();

    expect(snapshot.inboxId).toBe(fake.inboxId);
    expect(snapshot.projectProfiles.map((p) => p.id)).toEqual(['p1']);
    expect(snapshot.syncTaskBean.update.map((t) => t.id)).toEqual(['t1']);
    expect(snapshot).toMatchObject({ checkPoint: 1, filters: [] });
  });
});
