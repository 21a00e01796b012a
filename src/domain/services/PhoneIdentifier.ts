// Optional leading "+", then 4 to 15 digits.
const phonePattern = /^\+?\d{4,15}$/;

export const isValidPhone = (phone: string): boolean => phonePattern.test(phone);
