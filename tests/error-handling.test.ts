import { AppError, ErrorHandler, ErrorType } from '../src/utils/error-handler';

function errnoError(message: string, code: string): NodeJS.ErrnoException {
  const error: NodeJS.ErrnoException = new Error(message);
  error.code = code;
  return error;
}

describe('Error Handling', () => {
  const context = { operation: 'test' };

  beforeEach(() => {
    jest.spyOn(console, 'log').mockImplementation();
    jest.spyOn(console, 'warn').mockImplementation();
    jest.spyOn(console, 'error').mockImplementation();
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  describe('AppError', () => {
    it('should only treat missing tools as fatal', () => {
      expect(new AppError(ErrorType.MissingDependency, 'yt-dlp').isFatal()).toBe(true);
      expect(new AppError(ErrorType.ConfigurationError, 'bad').isFatal()).toBe(false);
      expect(new AppError(ErrorType.ValidationError, '--cover').isFatal()).toBe(false);
      expect(new AppError(ErrorType.ProcessFailed, 'exit 1').isFatal()).toBe(false);
      expect(new AppError(ErrorType.Timeout, 'slow').isFatal()).toBe(false);
      expect(new AppError(ErrorType.MalformedOutput, 'json').isFatal()).toBe(false);
    });

    it('should build user messages per type', () => {
      expect(new AppError(ErrorType.MissingDependency, 'ffmpeg', { operation: 'startup' }).getUserMessage()).toBe(
        'Required tool is not installed: ffmpeg (startup)',
      );
      expect(new AppError(ErrorType.NotFound, '/music').getUserMessage()).toBe('File or folder not found: /music');
    });

    it('should stay an instance of AppError and Error', () => {
      const error = new AppError(ErrorType.Unknown, 'x');
      expect(error).toBeInstanceOf(AppError);
      expect(error).toBeInstanceOf(Error);
      expect(error.name).toBe('AppError');
    });
  });

  describe('ErrorHandler.parse', () => {
    it('should pass AppErrors through', () => {
      const original = new AppError(ErrorType.ProcessFailed, 'exit 2', { operation: 'download' });
      const parsed = ErrorHandler.parse(original, context);
      expect(parsed.type).toBe(ErrorType.ProcessFailed);
      expect(parsed.context).toEqual({ operation: 'download' });
    });

    it('should map ENOENT to NotFound', () => {
      expect(ErrorHandler.parse(errnoError('no such file', 'ENOENT'), context).type).toBe(ErrorType.NotFound);
    });

    it.each(['EACCES', 'EPERM', 'EBUSY', 'EISDIR', 'ENOTDIR'])('should map %s to FileSystem', (code) => {
      expect(ErrorHandler.parse(errnoError('nope', code), context).type).toBe(ErrorType.FileSystem);
    });

    it('should map JSON syntax errors to MalformedOutput', () => {
      let syntaxError: unknown;
      try {
        JSON.parse('{');
      } catch (error) {
        syntaxError = error;
      }
      expect(ErrorHandler.parse(syntaxError, context).type).toBe(ErrorType.MalformedOutput);
    });

    it('should recognise timeouts by message', () => {
      expect(ErrorHandler.parse(new Error('yt-dlp timed out'), context).type).toBe(ErrorType.Timeout);
    });

    it('should wrap non-Error values as Unknown', () => {
      const parsed = ErrorHandler.parse('plain string', context);
      expect(parsed.type).toBe(ErrorType.Unknown);
      expect(parsed.message).toBe('plain string');
    });
  });

  describe('ErrorHandler.messageOf', () => {
    it('should read messages from errors and other values', () => {
      expect(ErrorHandler.messageOf(new Error('boom'))).toBe('boom');
      expect(ErrorHandler.messageOf(7)).toBe('7');
    });
  });
});
