// Mentions of service staff or responses turn a strategic match into a negative one.
export const CUSTOMER_SERVICE_MARKERS: readonly string[] = [
  '客服',
  '服務',
  '售後',
  '回應',
  '處理',
  '態度',
  '回覆',
  '店員',
  '員工',
  'customer service',
  'support',
  'staff',
  'employee',
  'reply',
  'response',
  'attitude',
];

export function mentionsCustomerService(normalizedText: string): boolean {
  return CUSTOMER_SERVICE_MARKERS.some((marker) => normalizedText.includes(marker));
}
