import { z } from 'zod';
import { ref, stageGraph, task, workflow, zodSchema } from '@quarry/sdk';

// Order summary ETL. Load this module through QUARRY_DEFINITIONS to register
// it on the global registry; the sources are in-memory stand-ins.

const customerSchema = z.object({ id: z.number(), name: z.string(), email: z.string() });
const orderSchema = z.object({
    id: z.number(),
    customerId: z.number(),
    totalAmount: z.number(),
    status: z.string(),
});
const summarySchema = z.object({
    customerId: z.number(),
    customerName: z.string(),
    totalOrders: z.number(),
    totalSpent: z.number(),
    averageOrderValue: z.number(),
});

export type Customer = z.infer<typeof customerSchema>;
export type Order = z.infer<typeof orderSchema>;
export type OrderSummary = z.infer<typeof summarySchema>;

const TAG = '[order-summary]';

export function summarizeOrders(customers: Customer[], orders: Order[]): OrderSummary[] {
    const byId = new Map(customers.map(c => [c.id, c]));
    const grouped = new Map<number, Order[]>();
    for (const order of orders) {
        grouped.set(order.customerId, [...(grouped.get(order.customerId) ?? []), order]);
    }

    const summaries: OrderSummary[] = [];
    for (const [customerId, placed] of grouped) {
        const customer = byId.get(customerId);
        if (!customer) continue;
        const totalSpent = placed.reduce((sum, o) => sum + o.totalAmount, 0);
        summaries.push({
            customerId,
            customerName: customer.name,
            totalOrders: placed.length,
            totalSpent,
            averageOrderValue: totalSpent / placed.length,
        });
    }
    return summaries;
}

task({
    name: 'extract_customers',
    description: 'Extract customer data from the source system',
    tags: ['extract', 'customer'],
    input: zodSchema(z.object({})),
    output: zodSchema(z.array(customerSchema)),
    run: () => [
        { id: 1, name: 'Ada Park', email: 'ada@example.com' },
        { id: 2, name: 'Ben Ortiz', email: 'ben@example.com' },
    ],
});

task({
    name: 'extract_orders',
    description: 'Extract order data from the source system',
    tags: ['extract', 'order'],
    input: zodSchema(z.object({})),
    output: zodSchema(z.array(orderSchema)),
    run: () => [
        { id: 1, customerId: 1, totalAmount: 100, status: 'completed' },
        { id: 2, customerId: 1, totalAmount: 50, status: 'completed' },
        { id: 3, customerId: 2, totalAmount: 75, status: 'completed' },
    ],
});

task({
    name: 'transform_order_summary',
    description: 'Summarize orders per customer',
    tags: ['transform', 'order', 'summary'],
    input: zodSchema(z.object({ customers: z.array(customerSchema), orders: z.array(orderSchema) })),
    output: zodSchema(z.array(summarySchema)),
    run: ({ customers, orders }) => summarizeOrders(customers, orders),
});

task({
    name: 'load_order_summary',
    description: 'Load order summaries into the target system',
    tags: ['load', 'order', 'summary'],
    input: zodSchema(z.object({ summaries: z.array(summarySchema) })),
    run: ({ summaries }) => {
        for (const s of summaries) {
            console.log(
                `${TAG} ${s.customerName}: ${s.totalOrders} orders, ${s.totalSpent.toFixed(2)} spent, ${s.averageOrderValue.toFixed(2)} average`,
            );
        }
        return { loaded: summaries.length };
    },
});

stageGraph({
    name: 'extract_transform_load',
    description: 'Extract, transform and load order summary data',
    steps: [
        { name: 'extract_customers', task: 'extract_customers', stage: 0 },
        { name: 'extract_orders', task: 'extract_orders', stage: 0 },
        {
            name: 'transform_order_summary',
            task: 'transform_order_summary',
            stage: 1,
            dependsOn: ['extract_customers', 'extract_orders'],
            params: { customers: ref('extract_customers'), orders: ref('extract_orders') },
        },
        {
            name: 'load_order_summary',
            task: 'load_order_summary',
            stage: 2,
            dependsOn: ['transform_order_summary'],
            params: { summaries: ref('transform_order_summary') },
        },
    ],
});

workflow({
    name: 'order_summary_etl',
    description: 'ETL process for order summary data',
    stageGraphs: [{ stageGraph: 'extract_transform_load', position: 0 }],
    tags: ['order', 'summary', 'etl'],
});
