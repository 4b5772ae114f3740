import { ArgumentsHost, ValidationError as ClassValidatorError } from '@nestjs/common';
import { ExecutionContextHost } from '@nestjs/core/helpers/execution-context-host';
import { DomainExceptionFilter } from '../domain-exception.filter';
import { InsufficientStockError, PublishError, ValidationError } from '../errors';
import { validationExceptionFactory } from '../validation';

describe('DomainExceptionFilter', () => {
  const filter = new DomainExceptionFilter();
  let status: jest.Mock;
  let json: jest.Mock;
  let host: ArgumentsHost;

  beforeEach(() => {
    json = jest.fn();
    status = jest.fn().mockReturnValue({ json });
    host = new ExecutionContextHost([{}, { status }]);
  });

  it('should map a validation failure to 400 with its violations', () => {
    filter.catch(new ValidationError('quantity must not be less than 1'), host);

    expect(status).toHaveBeenCalledWith(400);
    expect(json).toHaveBeenCalledWith({
      statusCode: 400,
      error: 'ValidationError',
      message: 'quantity must not be less than 1',
      violations: ['quantity must not be less than 1'],
    });
  });

  it('should map insufficient stock to 409', () => {
    filter.catch(new InsufficientStockError(5, 2, 1), host);

    expect(status).toHaveBeenCalledWith(409);
    expect(json).toHaveBeenCalledWith({
      statusCode: 409,
      error: 'InsufficientStockError',
      message: 'Item 5 is out of stock: requested 2, available 1',
      itemId: 5,
      requested: 2,
      available: 1,
    });
  });

  it('should map a publish failure to 503 and pass the order id on', () => {
    filter.catch(new PublishError('Order was stored but could not be confirmed', true, { order_id: 'order-1' }), host);

    expect(status).toHaveBeenCalledWith(503);
    expect(json).toHaveBeenCalledWith({
      statusCode: 503,
      error: 'PublishError',
      message: 'Order was stored but could not be confirmed',
      order_id: 'order-1',
      ambiguous: true,
    });
  });
});

describe('validationExceptionFactory', () => {
  it('should collect every violation and lead with the first', () => {
    const errors: ClassValidatorError[] = [
      { property: 'name', constraints: { isNotEmpty: 'name should not be empty' }, children: [] },
      { property: 'quantity', constraints: { min: 'quantity must not be less than 1' }, children: [] },
    ];

    const error = validationExceptionFactory(errors);

    expect(error).toBeInstanceOf(ValidationError);
    expect(error.message).toBe('name should not be empty');
    expect(error.violations).toEqual(['name should not be empty', 'quantity must not be less than 1']);
  });

  it('should prefix nested violations with the path of their parent', () => {
    const errors: ClassValidatorError[] = [
      {
        property: 'shipping',
        children: [
          {
            property: 'address',
            children: [{ property: 'city', constraints: { isNotEmpty: 'city should not be empty' }, children: [] }],
          },
        ],
      },
    ];

    const error = validationExceptionFactory(errors);

    expect(error.violations).toEqual(['shipping.address.city should not be empty']);
  });
});
