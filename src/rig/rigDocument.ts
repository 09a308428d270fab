import 'reflect-metadata';
import { plainToInstance, Type } from 'class-transformer';
import { IsArray, IsNotEmpty, IsObject, IsOptional, IsString, ValidateNested, validateSync } from 'class-validator';
import { RIG_DOCUMENT_VERSION } from '../config';
import { collectConstraintMessages } from '../fields/FieldStore';
import type { RigModuleRecord } from '../modules/types';
import { ValidationError } from '../shared/errors';
import {
  RIG_DOCUMENT_INVALID,
  RIG_DOCUMENT_NOT_OBJECT,
  RIG_DOCUMENT_VERSION_EXPECTED,
  RIG_DOCUMENT_VERSION_UNSUPPORTED
} from '../shared/messages';
import type { NodeRef } from '../types/scene';

export type RigDocument = {
  version: typeof RIG_DOCUMENT_VERSION;
  name: string;
  /** Joints the rig references but did not create. */
  externalJoints: NodeRef[];
  groups: { controls: NodeRef | null; extras: NodeRef | null };
  modules: RigModuleRecord[];
};

class RigGroupsDto {
  @IsOptional()
  @IsString()
  controls: string | null = null;

  @IsOptional()
  @IsString()
  extras: string | null = null;
}

class RigModuleRecordDto {
  @IsString()
  @IsNotEmpty()
  type!: string;

  @IsObject()
  fields!: Record<string, unknown>;
}

class RigDocumentDto {
  @IsString()
  @IsNotEmpty()
  name!: string;

  @IsArray()
  @IsString({ each: true })
  externalJoints!: string[];

  @ValidateNested()
  @Type(() => RigGroupsDto)
  groups!: RigGroupsDto;

  @IsArray()
  @ValidateNested({ each: true })
  @Type(() => RigModuleRecordDto)
  modules!: RigModuleRecordDto[];
}

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === 'object' && value !== null && !Array.isArray(value);

/** Validates a stored rig document; module field values are checked later by each module's schema. */
export const parseRigDocument = (raw: unknown): RigDocument => {
  if (!isRecord(raw)) {
    throw new ValidationError('document', RIG_DOCUMENT_NOT_OBJECT, [RIG_DOCUMENT_NOT_OBJECT]);
  }
  if (raw.version !== RIG_DOCUMENT_VERSION) {
    throw new ValidationError('version', RIG_DOCUMENT_VERSION_UNSUPPORTED(raw.version), [
      RIG_DOCUMENT_VERSION_EXPECTED(RIG_DOCUMENT_VERSION)
    ]);
  }
  const dto = plainToInstance(RigDocumentDto, raw);
  const errors = validateSync(dto, { forbidUnknownValues: true });
  if (errors.length > 0) {
    const reasons = collectConstraintMessages(errors);
    throw new ValidationError(errors[0].property, RIG_DOCUMENT_INVALID(reasons), reasons);
  }
  return {
    version: RIG_DOCUMENT_VERSION,
    name: dto.name,
    externalJoints: [...dto.externalJoints],
    groups: { controls: dto.groups.controls, extras: dto.groups.extras },
    modules: dto.modules.map((record) => ({ type: record.type, fields: { ...record.fields } }))
  };
};
