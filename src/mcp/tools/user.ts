import { respond } from '../respond.js';
import { DateWindowParams, type ToolContext } from './shared.js';

export function registerUserTools({ server, client, logger }: ToolContext): void {
  server.tool('get_profile', 'Account profile.', () => respond('get_profile', logger, () => client.getProfile()));

  server.tool('get_status', 'Account status (id, inbox, subscription).', () =>
    respond('get_status', logger, () => client.getStatus()),
  );

  server.tool('get_statistics', 'Completion and focus totals.', () =>
    respond('get_statistics', logger, () => client.getStatistics()),
  );

  server.tool('get_focus_heatmap', 'Focus minutes per day.', DateWindowParams.shape, (window) =>
    respond('get_focus_heatmap', logger, () => client.getFocusHeatmap(window)),
  );

  server.tool('get_focus_distribution', 'Focus minutes per project and tag.', DateWindowParams.shape, (window) =>
    respond('get_focus_distribution', logger, () => client.getFocusDistribution(window)),
  );

  server.tool('full_sync', 'Raw account snapshot.', () => respond('full_sync', logger, () => client.fullSync()));
}
