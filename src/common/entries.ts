import mime from 'mime-types';
import type { Entry, EntryRecord } from '../types/entry';
import { effectiveName, isDisabled } from './nameCodec';

export const materialiseEntry = (record: EntryRecord): Entry => ({
  ...record,
  effectiveName: effectiveName(record.rawName),
  isDisabled: isDisabled(record.rawName),
  mimeType: record.isDirectory ? null : mime.lookup(record.rawName) || null,
});
