import bcrypt from 'bcryptjs';

/**
 * Hash a plain text password
 */
export const hashPassword = async (password: string, saltRounds: number): Promise<string> => {
  return await bcrypt.hash(password, saltRounds);
};

/**
 * Compare a plain text password with a hashed password
 */
export const comparePassword = async (password: string, hashedPassword: string): Promise<boolean> => {
  return await bcrypt.compare(password, hashedPassword);
};

export const normalizeEmail = (email: string): string => email.trim().toLowerCase();

/**
 * Format error messages consistently
 */
export const formatError = (message: string, code?: string) => {
  return {
    error: true,
    message,
    code: code || 'UNKNOWN_ERROR',
    timestamp: new Date().toISOString(),
  };
};

/**
 * Format success responses consistently
 */
export const formatSuccess = <T>(data: T, message?: string) => {
  return {
    success: true,
    message: message || 'Operation completed successfully',
    data,
    timestamp: new Date().toISOString(),
  };
};
