/**
 * Email Templates
 *
 * HTML bodies for the transactional and summary emails. Every user-supplied
 * value goes through escapeHtml.
 */

export interface Branding {
	readonly appName: string;
	readonly frontendUrl: string;
}

export interface RenderedEmail {
	readonly subject: string;
	readonly html: string;
}

export interface SummaryLink {
	readonly title: string;
	readonly clicks: number;
}

export interface SummaryFigures {
	readonly totalClicks: number;
	readonly uniqueVisitors: number;
	readonly topLinks: readonly SummaryLink[];
	readonly growthPercentage: number;
}

const HTML_ESCAPES: Readonly<Record<string, string>> = {
	'&': '&amp;',
	'<': '&lt;',
	'>': '&gt;',
	'"': '&quot;',
	"'": '&#039;',
};

export function escapeHtml(text: string): string {
	return text.replace(/[&<>"']/g, (char) => HTML_ESCAPES[char] ?? char);
}

const BASE_STYLE = `
    body { font-family: 'Segoe UI', Tahoma, Geneva, Verdana, sans-serif; margin: 0; padding: 0; background-color: #f8fafc; }
    .container { max-width: 600px; margin: 0 auto; background-color: white; }
    .header h1 { color: white; margin: 0; font-size: 28px; }
    .content { padding: 40px; }
    .footer { text-align: center; padding: 30px; color: #6b7280; font-size: 14px; }`;

interface LayoutOptions {
	readonly accent: string;
	readonly title: string;
	readonly body: string;
	readonly recipient: string;
	readonly style?: string;
}

function layout(branding: Branding, options: LayoutOptions): string {
	const appName = escapeHtml(branding.appName);

	return `<!DOCTYPE html>
<html>
<head>
  <meta charset="utf-8">
  <style>${BASE_STYLE}
    .header { background: ${options.accent}; padding: 40px; text-align: center; }
    .cta-button { display: inline-block; background: ${options.accent}; color: white; padding: 15px 30px; text-decoration: none; border-radius: 8px; font-weight: bold; }${options.style ?? ''}
  </style>
</head>
<body>
  <div class="container">
    <div class="header">
      <h1>${options.title}</h1>
    </div>
    <div class="content">
${options.body}
      <p>Best regards,<br>The ${appName} Team</p>
    </div>
    <div class="footer">
      <p>This email was sent to ${escapeHtml(options.recipient)}</p>
      <p>&copy; ${new Date().getUTCFullYear()} ${appName}. All rights reserved.</p>
    </div>
  </div>
</body>
</html>`;
}

export function welcomeEmail(branding: Branding, recipient: string, username: string): RenderedEmail {
	const appName = escapeHtml(branding.appName);
	const dashboardUrl = escapeHtml(`${branding.frontendUrl}/dashboard`);

	return {
		subject: `Welcome to ${branding.appName}! 🎉`,
		html: layout(branding, {
			accent: 'linear-gradient(135deg, #667eea 0%, #764ba2 100%)',
			title: `Welcome to ${appName}!`,
			recipient,
			style: `
    .features { background-color: #f8fafc; padding: 30px; border-radius: 8px; margin: 30px 0; }
    .feature { margin-bottom: 15px; }`,
			body: `      <p>Hi <strong>${escapeHtml(username)}</strong>,</p>
      <p>🎉 <strong>Your account has been created successfully!</strong></p>
      <div class="features">
        <h3>What you can do now:</h3>
        <div class="feature">✨ <strong>Create links</strong> to showcase your content</div>
        <div class="feature">📊 <strong>Track analytics</strong> to see how your links perform</div>
        <div class="feature">🎨 <strong>Customize your page</strong> with icons and ordering</div>
      </div>
      <p>Ready to get started? Open your dashboard and create your first link!</p>
      <div style="text-align: center; margin: 30px 0;">
        <a href="${dashboardUrl}" class="cta-button">Go to Dashboard &rarr;</a>
      </div>
      <p>If you have any questions, just reply to this email.</p>`,
		}),
	};
}

export function passwordResetEmail(
	branding: Branding,
	recipient: string,
	username: string,
	resetToken: string,
	expireMinutes: number,
): RenderedEmail {
	const resetLink = escapeHtml(`${branding.frontendUrl}/reset-password?token=${encodeURIComponent(resetToken)}`);

	return {
		subject: `Reset your ${branding.appName} password 🔐`,
		html: layout(branding, {
			accent: 'linear-gradient(135deg, #dc2626 0%, #b91c1c 100%)',
			title: '🔐 Password Reset Request',
			recipient,
			style: `
    .warning { background-color: #fef2f2; border-left: 4px solid #dc2626; padding: 20px; margin: 30px 0; }
    .raw-link { word-break: break-all; background-color: #f3f4f6; padding: 10px; border-radius: 4px; font-family: monospace; }`,
			body: `      <p>Hi <strong>${escapeHtml(username)}</strong>,</p>
      <p>We received a request to reset the password of your ${escapeHtml(branding.appName)} account.</p>
      <div style="text-align: center; margin: 30px 0;">
        <a href="${resetLink}" class="cta-button">Reset Your Password</a>
      </div>
      <div class="warning">
        <strong>⚠️ Important:</strong>
        <ul>
          <li>This link will expire in ${expireMinutes} minutes</li>
          <li>If you didn't request this reset, you can ignore this email</li>
          <li>Never share this link with anyone</li>
        </ul>
      </div>
      <p>If the button doesn't work, copy and paste this link into your browser:</p>
      <p class="raw-link">${resetLink}</p>`,
		}),
	};
}

export function analyticsSummaryEmail(
	branding: Branding,
	recipient: string,
	username: string,
	figures: SummaryFigures,
): RenderedEmail {
	const analyticsUrl = escapeHtml(`${branding.frontendUrl}/dashboard/analytics`);
	const topLinks = figures.topLinks
		.slice(0, 3)
		.map(
			(link) =>
				`<div class="link-item"><span>${escapeHtml(link.title)}</span><span>${link.clicks} clicks</span></div>`,
		)
		.join('\n        ');

	return {
		subject: `📊 Your weekly ${branding.appName} analytics summary`,
		html: layout(branding, {
			accent: 'linear-gradient(135deg, #059669 0%, #047857 100%)',
			title: '📊 Weekly Analytics Summary',
			recipient,
			style: `
    .stat-grid { display: grid; grid-template-columns: 1fr 1fr; gap: 20px; margin: 30px 0; }
    .stat-card { background-color: #f8fafc; padding: 20px; border-radius: 8px; text-align: center; }
    .stat-number { font-size: 32px; font-weight: bold; color: #059669; }
    .stat-label { color: #6b7280; font-size: 14px; margin-top: 5px; }
    .top-links { background-color: #f8fafc; padding: 20px; border-radius: 8px; margin: 30px 0; }
    .link-item { display: flex; justify-content: space-between; padding: 10px 0; border-bottom: 1px solid #e5e7eb; }`,
			body: `      <p>Hi <strong>${escapeHtml(username)}</strong>,</p>
      <p>Here's how your links performed this week:</p>
      <div class="stat-grid">
        <div class="stat-card">
          <div class="stat-number">${figures.totalClicks}</div>
          <div class="stat-label">Total Clicks</div>
        </div>
        <div class="stat-card">
          <div class="stat-number">${figures.uniqueVisitors}</div>
          <div class="stat-label">Unique Visitors</div>
        </div>
      </div>
      <div class="top-links">
        <h3>🔥 Top Performing Links:</h3>
        ${topLinks}
      </div>
      <p>🚀 <strong>Growth:</strong> Your clicks are ${figures.growthPercentage.toFixed(1)}% compared to last week!</p>
      <div style="text-align: center; margin: 30px 0;">
        <a href="${analyticsUrl}" class="cta-button">View Full Analytics &rarr;</a>
      </div>
      <p>Keep up the great work!</p>`,
		}),
	};
}
