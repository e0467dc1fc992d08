import type { AlertContent, PendingAlert } from '../types.js';

export const PROMO_CODE = 'NBA50';

export function buildAlertContent(alerts: readonly PendingAlert[]): AlertContent {
  const first = alerts[0];
  if (!first) {
    throw new Error('Cannot build alert content for an empty batch');
  }
  const headline = first.event;

  const lines = alerts.map(({ event }) => {
    const matchup = event.opponent ? `${event.team} vs ${event.opponent}` : event.team;
    return `- ${event.player.trim()}: ${event.points} points (${matchup}, ${event.date})`;
  });

  return {
    subject: `DoorDash 50% OFF Today! ${headline.player.trim()} scored ${headline.points} points`,
    text: [
      'An NBA player scored 50+ points:',
      ...lines,
      '',
      `Use code ${PROMO_CODE} at checkout. Valid today only.`,
    ].join('\n'),
  };
}
