export const DEFAULT_ALLOWED_ORIGINS = ['https://noveos.jp', 'http://localhost:8080', 'http://localhost:3000'];

// Netlify preview deployments of the website
export const NETLIFY_ORIGIN = /^https:\/\/[a-z0-9-]+\.netlify\.app$/;

export function buildCorsOrigins(allowedOrigins: string | undefined): (string | RegExp)[] {
	const origins = allowedOrigins
		?.split(',')
		.map((origin) => origin.trim())
		.filter(Boolean);
	return [...(origins && origins.length > 0 ? origins : DEFAULT_ALLOWED_ORIGINS), NETLIFY_ORIGIN];
}
