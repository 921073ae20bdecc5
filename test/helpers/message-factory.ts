import type { Delivery, Message } from '../../src/messages/interfaces';

/**
 * A fully populated outbound message. Timestamps are whole seconds so the
 * projected epoch values are easy to assert.
 */
export function createMessage(overrides: Partial<Message> = {}): Message {
  return {
    id: 101,
    token: 'tok-101',
    status: 'Sent',
    lastDeliveryAttempt: new Date('2024-01-05T13:30:05Z'),
    held: false,
    holdExpiry: null,
    rcptTo: 'user@example.com',
    mailFrom: 'app@example.org',
    subject: 'Welcome aboard',
    messageId: 'welcome-1@example.org',
    timestamp: new Date('2024-01-05T13:30:00Z'),
    direction: 'outbound',
    size: 123,
    bounce: false,
    bounceForId: null,
    tag: 'welcome',
    receivedWithSsl: false,
    inspected: true,
    spam: false,
    spamScore: 0.4,
    threat: false,
    threatDetails: null,
    plainBody: 'Hello there.',
    htmlBody: '<p>Hello there.</p>',
    rawMessage: Buffer.from('Subject: Welcome aboard\r\n\r\nHello there.\r\n'),
    headers: { subject: ['Welcome aboard'] },
    attachments: [{ filename: 'invoice.txt', mimeType: 'text/plain', body: Buffer.from('Amount due: 10.00\n') }],
    loads: 2,
    clicks: 1,
    ...overrides,
  };
}

export function createDelivery(overrides: Partial<Delivery> = {}): Delivery {
  return {
    id: 7001,
    status: 'Sent',
    details: 'Message for user@example.com accepted by mx.example.com',
    output: '  250 2.0.0 OK queued\n',
    sentWithSsl: true,
    logId: 'QX7TB2',
    time: new Date('2024-01-05T13:30:05Z'),
    timestamp: new Date('2024-01-05T13:30:06Z'),
    ...overrides,
  };
}
