import { LoggingInterceptor } from './Logging.interceptor';

describe('LoggingInterceptor', () => {
	const interceptor = new LoggingInterceptor();

	it('masks sensitive fields', () => {
		expect(interceptor.sanitize({ headline: 'Sale', token: 'test-token' })).toEqual({ headline: 'Sale', token: '***' });
	});

	it('summarises base64 payloads', () => {
		expect(interceptor.sanitize({ success: true, image_base64: 'A'.repeat(2048) })).toEqual({
			success: true,
			image_base64: '<2.00 KB base64>',
		});
	});

	it('passes non-objects through', () => {
		expect(interceptor.sanitize('plain')).toBe('plain');
		expect(interceptor.sanitize(undefined)).toBeUndefined();
	});

	it('formats response sizes', () => {
		expect(interceptor.getResponseSize(null)).toBe('0 B');
		expect(interceptor.getResponseSize({ ok: true })).toBe('11 B');
	});
});
