import type { RuleInput } from '../types/rule.js';

/**
 * Startovní sada pravidel pro prázdnou schránku.
 */
export function createDefaultRules(): RuleInput[] {
  return [
    {
      name: 'Auto-delete old marketing',
      priority: 90,
      matchMode: 'all',
      conditions: [
        { type: 'category_is', category: 'marketing' },
        { type: 'age_greater_than', days: 7 }
      ],
      actions: [{ type: 'delete' }]
    },
    {
      name: 'Mark newsletters as read',
      priority: 80,
      matchMode: 'all',
      conditions: [
        { type: 'category_is', category: 'newsletters' },
        { type: 'age_greater_than', days: 3 }
      ],
      actions: [{ type: 'mark_read' }]
    },
    {
      name: 'Prioritize bills',
      priority: 95,
      matchMode: 'all',
      conditions: [{ type: 'category_is', category: 'bills' }],
      actions: [{ type: 'set_priority', value: 9 }]
    }
  ];
}
