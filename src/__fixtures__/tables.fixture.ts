/**
 * Table definitions as the service returns them with `type=full`.
 */
export function salesOrdersTable(): Record<string, unknown> & { id: string; name: string } {
  return {
    id: 'T1',
    name: 'sales_orders',
    displayName: 'Sales Orders',
    description: 'Orders loaded nightly',
    enableForAnalysis: true,
    createdBy: { id: 'u-1', descriptor: 'Integration User' },
    createdMoment: '2024-01-01T00:00:00Z',
    fields: [
      {
        id: 'f-0',
        fieldId: 'F0',
        name: 'WPA_LoadId',
        displayName: 'Load Id',
        ordinal: 1,
        type: { id: 't-0', descriptor: 'Text' },
        externalId: false,
        required: false,
      },
      {
        id: 'f-1',
        fieldId: 'F1',
        name: 'order_id',
        displayName: 'Order Id',
        ordinal: 2,
        type: { id: 't-1', descriptor: 'Text' },
        externalId: true,
        required: true,
      },
      {
        id: 'f-2',
        fieldId: 'F2',
        name: 'amount',
        displayName: 'Amount',
        ordinal: 3,
        type: { id: 't-2', descriptor: 'Decimal' },
        precision: 12,
        scale: 2,
        externalId: false,
        required: false,
      },
      {
        id: 'f-3',
        fieldId: 'F3',
        name: 'WPA_RowID',
        displayName: 'Row Id',
        ordinal: 4,
        type: { id: 't-3', descriptor: 'Text' },
        externalId: false,
        required: false,
      },
      {
        id: 'f-4',
        fieldId: 'F4',
        name: 'order_date',
        displayName: 'Order Date',
        ordinal: 5,
        type: { id: 't-4', descriptor: 'Date' },
        parseFormat: 'yyyy-MM-dd',
        externalId: false,
        required: false,
      },
    ],
  };
}

/**
 * Summary listing entry for a table.
 */
export function tableSummary(id: string, name: string, displayName = name): Record<string, unknown> {
  return { id, name, displayName };
}
