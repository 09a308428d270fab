import { NAME_SEGMENT_PATTERN, SIDES, type Side } from '../domain/naming';
import { AttributeBindingsField, EnumField, NodeField, NodeListField, StringField } from '../fields/fieldDecorators';
import type { AttributeBindingValue } from '../fields/fieldTypes';
import type { NodeRef } from '../types/scene';

export class RigModuleFields {
  @StringField({ displayable: true, editable: true, pattern: NAME_SEGMENT_PATTERN, guiOrder: 0, tooltip: 'Name of the module, unique per side, used in every node it creates.' })
  name = 'module';

  @EnumField(SIDES, { displayable: true, editable: true, guiOrder: 0 })
  side: Side = 'M';

  @NodeField({
    displayable: true,
    editable: true,
    tooltip: 'Joint the module hangs from. It may belong to another module.'
  })
  parentJoint: NodeRef | null = null;

  @NodeListField({ displayable: true })
  deformJoints: NodeRef[] = [];

  @NodeField()
  controlsGroup: NodeRef | null = null;

  @NodeField()
  extrasGroup: NodeRef | null = null;

  @NodeListField()
  buildNodes: NodeRef[] = [];

  @AttributeBindingsField()
  persistentAttributes: AttributeBindingValue[] = [];
}
