/**
 * Phone Number Utility Functions
 *
 * Caller numbers arrive free-form from the telephony pipeline (E.164 from
 * Twilio, but also "anonymous" or blank), so they are only tidied, not validated.
 */

/**
 * Trim a caller number; blank or missing numbers are stored as null
 */
export const cleanPhoneNumber = (phoneNumber: string | null | undefined): string | null => {
  if (phoneNumber === null || phoneNumber === undefined) {
    return null;
  }

  const trimmed = phoneNumber.trim();
  return trimmed.length > 0 ? trimmed : null;
};

/**
 * Mask phone number for logging
 *
 * Masks the last 4 characters
 * Example: +12025551234 -> +1202555****
 */
export const maskPhoneNumber = (phoneNumber: string | null | undefined): string => {
  if (!phoneNumber || phoneNumber.length < 4) {
    return '****';
  }

  return `${phoneNumber.slice(0, -4)}****`;
};
