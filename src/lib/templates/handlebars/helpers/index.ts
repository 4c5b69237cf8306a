import * as Handlebars from 'handlebars';

const EMPTY_VALUE = '-';

// Blank strings, null and undefined all render as the fallback
Handlebars.registerHelper('fallback', function (value: unknown, fallback: unknown) {
	if (value === null || value === undefined || (typeof value === 'string' && value.trim() === '')) {
		return typeof fallback === 'string' ? fallback : EMPTY_VALUE;
	}
	return value;
});

Handlebars.registerHelper('pluralize', function (count: number, singular: string, plural: string) {
	return `${count} ${count === 1 ? singular : plural}`;
});

// Preserves line breaks of free text such as contact messages
Handlebars.registerHelper('multiline', function (text: unknown) {
	if (typeof text !== 'string') {
		return '';
	}
	const escaped = Handlebars.escapeExpression(text);
	return new Handlebars.SafeString(escaped.replace(/\r?\n/g, '<br>'));
});
