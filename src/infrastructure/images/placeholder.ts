/** 1×1 transparent GIF served whenever no real image can be returned. */
export const PLACEHOLDER_GIF = Buffer.from(
  '47494638396101000100800000ffffff00ff21f90401000000002c000000000100010000020144003b',
  'hex',
);

export const PLACEHOLDER_CONTENT_TYPE = 'image/gif';
