import { ValidationPipe } from './validation.pipe';
import { BookSlotsDto } from '../../bookings/dto/book-slots.dto';
import { RegisterDto } from '../../auth/dto/register.dto';
import { InvalidInputException } from '../exceptions/domain.exceptions';

describe('ValidationPipe', () => {
  const pipe = new ValidationPipe();

  it('should return a typed instance for valid bodies', async () => {
    const result = await pipe.transform({ type: 'vip', slots: ['V1', 'V2'] }, { type: 'body', metatype: BookSlotsDto });

    expect(result).toBeInstanceOf(BookSlotsDto);
    expect(result).toEqual({ type: 'vip', slots: ['V1', 'V2'] });
  });

  it('should normalise emails on registration', async () => {
    const result = await pipe.transform(
      { email: '  Driver@Parking.TEST ', password: 'Secret123' },
      { type: 'body', metatype: RegisterDto },
    );

    expect(result).toMatchObject({ email: 'driver@parking.test' });
  });

  it('should report failures per property', async () => {
    await expect(
      pipe.transform({ type: 'gold', slots: [] }, { type: 'body', metatype: BookSlotsDto }),
    ).rejects.toMatchObject({
      response: {
        code: 'INVALID_INPUT',
        message: 'Validation failed',
        details: {
          type: ['type must be one of: vip, executive, normal'],
          slots: ['slots must contain at least one slot'],
        },
      },
    });
  });

  it('should reject unknown properties', async () => {
    await expect(
      pipe.transform({ type: 'vip', slots: ['V1'], price: 0 }, { type: 'body', metatype: BookSlotsDto }),
    ).rejects.toBeInstanceOf(InvalidInputException);
  });

  it('should treat a missing body as empty', async () => {
    await expect(pipe.transform(undefined, { type: 'body', metatype: BookSlotsDto })).rejects.toBeInstanceOf(
      InvalidInputException,
    );
  });

  it('should pass primitives and custom parameters through', async () => {
    await expect(pipe.transform('V1', { type: 'param', metatype: String })).resolves.toBe('V1');
    await expect(pipe.transform({ id: 'u1' }, { type: 'custom', metatype: Object })).resolves.toEqual({ id: 'u1' });
  });
});
