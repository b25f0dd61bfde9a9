/** Values are stored one record per line with `|` between fields. */
export const FIELD_TEXT = /^[^|\r\n]*$/;
export const FIELD_TEXT_MESSAGE =
  '$property must not contain "|" or line breaks';

export const DATE_FORMAT = /^\d{2}\/\d{2}\/\d{4}$/;
export const TIME_FORMAT = /^\d{2}:\d{2}$/;
