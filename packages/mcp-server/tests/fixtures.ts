import type { AnalysisUnit } from '@mapcheck/core';

/** Order.Id is an int, OrderDto.Id a string */
export function ordersUnit(id = 'orders'): AnalysisUnit {
  return {
    id,
    shapes: [
      {
        name: 'Order',
        members: [{ name: 'Id', type: { kind: 'primitive', name: 'int' }, settable: true, required: false, nullable: false }],
      },
      {
        name: 'OrderDto',
        members: [
          { name: 'Id', type: { kind: 'primitive', name: 'string' }, settable: true, required: false, nullable: false },
        ],
      },
    ],
    declarations: [
      { id: 'order-to-dto', sourceType: 'Order', destType: 'OrderDto', memberConfigs: [], hasReverseMap: false },
    ],
  };
}
