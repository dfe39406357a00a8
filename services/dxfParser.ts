import { PrimitiveKind, CadPrimitive, DxfEntity } from '../types';

/**
 * Parses ASCII DXF content.
 * Keeps CIRCLE and ARC entities (hole outlines) drawn in the ENTITIES section; every
 * other entity type, and anything inside a BLOCK definition, is skipped.
 * Tolerant of blank lines and of case in entity names.
 */
export const parseDxf = (dxfContent: string): DxfEntity[] => {
  const lines = dxfContent.split(/\r?\n/);
  const entities: DxfEntity[] = [];
  let currentEntity: DxfEntity | null = null;
  let section: string | null = null;
  let expectSectionName = false;
  let inBlock = false;

  const pushCurrentEntity = () => {
    if (currentEntity) {
      entities.push(currentEntity);
      currentEntity = null;
    }
  };

  // Iterate by pairs of group code and value
  for (let i = 0; i < lines.length - 1; i += 2) {
    const codeStr = lines[i].trim();
    if (codeStr === '') {
        // Skip blank lines without losing the code/value alignment
        i -= 1;
        continue;
    }

    const rawValue = lines[i + 1].trim();
    const value = rawValue.toUpperCase();

    const code = parseInt(codeStr, 10);
    if (isNaN(code)) continue;

    if (expectSectionName) {
      expectSectionName = false;
      if (code === 2) {
        section = value;
        continue;
      }
    }

    if (code === 0) {
      pushCurrentEntity(); // Group code 0 starts a new entity

      // Block definitions are templates in block-local coordinates, not drawn holes
      const drawn = section === 'ENTITIES' && !inBlock;

      switch (value) {
        case 'SECTION':
          expectSectionName = true;
          break;
        case 'ENDSEC':
          section = null;
          break;
        case 'BLOCK':
          inBlock = true;
          break;
        case 'ENDBLK':
          inBlock = false;
          break;
        case 'CIRCLE':
          if (!drawn) break;
          currentEntity = { type: 'CIRCLE', center: { x: 0, y: 0 }, radius: 0, layer: '0' };
          break;
        case 'ARC':
          if (!drawn) break;
          currentEntity = { type: 'ARC', center: { x: 0, y: 0 }, radius: 0, startAngle: 0, endAngle: 0, layer: '0' };
          break;
        default:
          break; // LINE, LWPOLYLINE, TEXT ...
      }
      continue;
    }

    const entity: DxfEntity | null = currentEntity;
    if (!entity) continue;

    const floatVal = parseFloat(rawValue);
    switch (code) {
      case 8: entity.layer = rawValue; break;
      case 10: entity.center.x = floatVal; break;
      case 20: entity.center.y = floatVal; break;
      case 40: entity.radius = floatVal; break;
      case 50: if (entity.type === 'ARC') entity.startAngle = floatVal; break;
      case 51: if (entity.type === 'ARC') entity.endAngle = floatVal; break;
    }
  }

  pushCurrentEntity();

  return entities;
};

/**
 * Maps parsed DXF entities to the CAD primitive records consumed by the extractor.
 */
export const dxfEntitiesToPrimitives = (entities: DxfEntity[]): CadPrimitive[] =>
  entities.map((entity): CadPrimitive => {
    switch (entity.type) {
      case 'CIRCLE':
        return {
          kind: PrimitiveKind.Circle,
          centerX: entity.center.x,
          centerY: entity.center.y,
          radius: entity.radius,
          layer: entity.layer,
        };
      case 'ARC':
        return {
          kind: PrimitiveKind.Arc,
          centerX: entity.center.x,
          centerY: entity.center.y,
          radius: entity.radius,
          startAngle: entity.startAngle,
          endAngle: entity.endAngle,
          layer: entity.layer,
        };
    }
  });
