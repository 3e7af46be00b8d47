export const PAYMENT_ADAPTER = Symbol('PAYMENT_ADAPTER');
