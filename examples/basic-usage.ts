/**
 * Basic Usage Example - Rule Sheet Validation
 *
 * This example demonstrates how to check model elements against a
 * tab-separated rule sheet and against rules built in code.
 */

import {
  createRuleEngine,
  flattenModel,
  InMemoryHostContext,
  parseRuleSheet,
  parseRuleTable,
  reportResults,
  RuleBuilder,
  type Element,
} from '../src';

const model: Element = {
  id: 'root',
  version: 3,
  elements: [
    {
      id: 'wall-1',
      category: 'Walls',
      properties: {
        Parameters: {
          'Instance Parameters': {
            Structural: { Structural: { name: 'Structural', value: 'Yes' } },
            Dimensions: { Width: { name: 'Width', value: 300 } },
          },
        },
      },
    },
    {
      id: 'wall-2',
      category: 'Walls',
      parameters: {
        WALL_ATTR_WIDTH_PARAM: { name: 'Width', value: 100 },
      },
    },
    { id: 'door-1', category: 'Doors', width: 900 },
  ],
};

const rulesTsv = [
  'Rule Number\tLogic\tProperty Name\tPredicate\tValue\tMessage\tReport Severity',
  '1\tWHERE\tcategory\tmatches\tWalls\tWall width ok\tWarning',
  '1\tCHECK\tWidth\tgreater than\t200\t\t',
  '2\tWHERE\tcategory\tmatches\tWindows\tWindows need a fire rating\tError',
  '2\tCHECK\tFire Rating\tnot empty\t\t\t',
].join('\n');

function main(): void {
  // ============================================================================
  // 1. Flatten the model
  // ============================================================================

  const elements = flattenModel(model).filter(element => element['category'] !== undefined);
  console.log(`Flattened ${elements.length} elements\n`);

  // ============================================================================
  // 2. Load rules from a sheet
  // ============================================================================

  const { groups, messages } = parseRuleTable(parseRuleSheet(rulesTsv));
  messages.forEach(message => console.log(message));
  if (groups === null) return;

  // ============================================================================
  // 3. Evaluate and report
  // ============================================================================

  const engine = createRuleEngine(elements);
  const context = new InMemoryHostContext(model);

  for (const group of groups) {
    const result = engine.evaluate(group);
    console.log(`Rule ${group.ruleId}: ${result.outcome}, ${result.passed.length} passed, ${result.failed.length} failed`);
    reportResults(context, result, group, { minimumSeverity: 'Info', hideSkipped: false });
  }

  for (const annotation of context.annotations) {
    console.log(`  ${annotation.level} ${annotation.category}: ${annotation.message} [${annotation.elementIds.join(', ')}]`);
  }

  // ============================================================================
  // 4. Build a rule in code
  // ============================================================================

  console.log('\n--- Fluent Builder Example ---');

  const structuralWalls = RuleBuilder
    .rule('structural-walls')
    .where('category').matches('Walls')
    .check('properties.Parameters.Instance Parameters.Structural.Structural').isTrue()
    .withMessage('Walls must be structural')
    .withSeverity('Error')
    .build();

  const validation = engine.validate(structuralWalls);
  validation.warnings.forEach(warning => console.log(`  warning: ${warning.message}`));

  const result = engine.evaluate(structuralWalls);
  console.log(`Structural walls: ${result.passed.map(element => String(element['id'])).join(', ')}`);
}

main();
