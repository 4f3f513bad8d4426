/**
 * Email bodies for a shared trip recommendation.
 */

import { Recommendation } from '@tripplanner/shared';

const PARAGRAPH_OPEN = '<p style="margin: 15px 0; line-height: 1.6;">';
const HEADING_OPEN =
  '<h3 style="color: #3498db; margin: 25px 0 15px 0; font-size: 20px; border-bottom: 2px solid #3498db; padding-bottom: 10px;">';
// Paragraphs opening with one of these read as section headings in the composed plan.
const SECTION_PARAGRAPH = /<p([^>]*)>((?:🌴|✈️?|🏨|💰|🗺️?|📋|🤝|📅|🎯|🎨|🔥|⚙️?)[^<]*)<\/p>/gu;

const HTML_ESCAPES: Record<string, string> = {
  '&': '&amp;',
  '<': '&lt;',
  '>': '&gt;',
  '"': '&quot;',
  "'": '&#x27;'
};

export function escapeHtml(text: string): string {
  return text.replace(/[&<>"']/g, (char) => HTML_ESCAPES[char] ?? char);
}

/**
 * Escapes free text and gives it paragraphs, line breaks and bold spans.
 */
export function formatTextForHtml(text: string): string {
  if (!text) {
    return "<p style='color: red;'>No recommendation available.</p>";
  }

  let formatted = escapeHtml(text)
    .split('\n\n')
    .join(`</p>${PARAGRAPH_OPEN}`)
    .split('\n')
    .join('<br>')
    .replace(/\*\*(.*?)\*\*/g, '<strong style="color: #2c3e50;">$1</strong>');

  if (!formatted.startsWith('<p')) {
    formatted = `${PARAGRAPH_OPEN}${formatted}</p>`;
  }

  return formatted.replace(SECTION_PARAGRAPH, `${HEADING_OPEN}$2</h3>`);
}

export function formatBudget(budget: number): string {
  return `$${Math.round(budget).toLocaleString('en-US')}`;
}

export function formatGeneratedAt(iso: string): string {
  const date = new Date(iso);
  if (Number.isNaN(date.getTime())) {
    return iso;
  }
  const day = date.toLocaleDateString('en-US', { year: 'numeric', month: 'long', day: '2-digit', timeZone: 'UTC' });
  const time = date.toLocaleTimeString('en-US', { hour: '2-digit', minute: '2-digit', hour12: true, timeZone: 'UTC' });
  return `${day} at ${time} UTC`;
}

export function emailSubject(senderName: string): string {
  return `🌍 Travel Recommendation from ${senderName}`;
}

export function buildRecommendationHtml(recommendation: Recommendation, senderName: string): string {
  const sources = recommendation.sources.length > 0 ? recommendation.sources.join(' • ') : 'Trip planner templates';
  return `<!DOCTYPE html>
<html>
<head>
  <meta charset="UTF-8">
  <meta name="viewport" content="width=device-width, initial-scale=1.0">
  <title>Travel Recommendation</title>
  <style>
    body { font-family: 'Segoe UI', Tahoma, Geneva, Verdana, sans-serif; line-height: 1.6; color: #333; max-width: 600px; margin: 0 auto; padding: 20px; background-color: #f8f9fa; }
    .header { background: linear-gradient(135deg, #667eea 0%, #764ba2 100%); color: white; padding: 30px 20px; text-align: center; border-radius: 10px 10px 0 0; }
    .content { background: white; padding: 30px; border-radius: 0 0 10px 10px; box-shadow: 0 4px 6px rgba(0,0,0,0.1); }
    .trip-details { background: #f8f9fa; padding: 20px; border-radius: 8px; margin: 20px 0; }
    .detail-item { margin: 10px 0; padding: 8px 0; border-bottom: 1px solid #dee2e6; }
    .detail-label { font-weight: bold; color: #495057; }
    .recommendation-text { background: #e3f2fd; padding: 20px; border-left: 4px solid #2196f3; margin: 20px 0; border-radius: 4px; }
    .footer { text-align: center; margin-top: 30px; padding-top: 20px; border-top: 1px solid #dee2e6; color: #6c757d; font-size: 14px; }
  </style>
</head>
<body>
  <div class="header">
    <h1>✈️ Travel Recommendation</h1>
    <p>Shared by ${escapeHtml(senderName)}</p>
  </div>
  <div class="content">
    <h2>🌍 ${escapeHtml(recommendation.title)}</h2>
    <div class="trip-details">
      <h3>📋 Trip Details</h3>
      <div class="detail-item"><span class="detail-label">🏖️ Destination:</span> ${escapeHtml(recommendation.destination)}</div>
      <div class="detail-item"><span class="detail-label">📅 Travel Dates:</span> ${escapeHtml(recommendation.dates)}</div>
      <div class="detail-item"><span class="detail-label">💰 Budget:</span> ${formatBudget(recommendation.budget)}</div>
    </div>
    <div class="recommendation-text">
      <h3>🤖 Trip Recommendation</h3>
      <div style="color: #2c3e50; line-height: 1.6; background-color: #ffffff; padding: 20px; border-radius: 10px;">
        ${formatTextForHtml(recommendation.body)}
      </div>
    </div>
    <div class="footer">
      <p>This recommendation was generated using data from:</p>
      <p><strong>${escapeHtml(sources)}</strong></p>
      <p>Generated on ${formatGeneratedAt(recommendation.generatedAt)}</p>
    </div>
  </div>
</body>
</html>
`;
}

export function buildRecommendationText(recommendation: Recommendation, senderName: string): string {
  const sources = recommendation.sources.length > 0 ? recommendation.sources.join(', ') : 'Trip planner templates';
  return [
    `Travel Recommendation shared by ${senderName}`,
    '',
    recommendation.title,
    '',
    `Destination: ${recommendation.destination}`,
    `Travel Dates: ${recommendation.dates}`,
    `Budget: ${formatBudget(recommendation.budget)}`,
    '',
    recommendation.body || 'No recommendation available.',
    '',
    `Generated from: ${sources}`,
    `Generated on ${formatGeneratedAt(recommendation.generatedAt)}`
  ].join('\n');
}
