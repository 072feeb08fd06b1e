/**
 * Editor Session Tests
 * End-to-end behaviour of the facade: edits, undo, navigation, search,
 * analysis, bookmarks, file lifecycle and notifications
 */

import * as path from 'path';
import { EditorSession } from '../src/editor-session';
import { RecentFiles } from '../src/recent-files';
import { DecodeKind, EditorErrorKind, NotificationType, QueryMode } from '../src/types/editor-types';
import { type EditorNotification, type FilePicker } from '../src/types/common';
import { testUtils } from './setup';

jest.setTimeout(15000);

function deadBeefBuffer(): Buffer {
  const bytes = Buffer.alloc(128);
  for (const offset of [10, 50, 90]) {
    bytes.set([0xde, 0xad], offset);
  }
  return bytes;
}

describe('EditorSession', () => {
  let session: EditorSession;
  let notifications: EditorNotification[];

  beforeEach(() => {
    session = new EditorSession();
    session.setClock(() => new Date('2024-01-01T00:00:00.000Z'));
    notifications = [];
    session.subscribe(n => notifications.push(n));
  });

  describe('Editing a zero-filled buffer', () => {
    beforeEach(() => {
      session.loadBytes(Buffer.alloc(64));
      notifications = [];
    });

    test('should track a single byte write and undo it', () => {
      const before = session.computeChecksums();

      expect(session.writeByte(10, 0xff)).toBe(true);
      expect(session.getState().isDirty).toBe(true);
      expect(session.isModified(10)).toBe(true);
      expect(session.getState().modifiedCount).toBe(1);

      const after = session.computeChecksums();
      expect(before.ok && after.ok).toBe(true);
      if (before.ok && after.ok) {
        expect(after.value.crc32).not.toBe(before.value.crc32);
        expect(after.value.md5).not.toBe(before.value.md5);
      }

      expect(session.undo()).toBe(true);
      expect(session.getByte(10)).toBe(0);
      expect(session.isModified(10)).toBe(false);
      expect(session.getState().isDirty).toBe(false);
      expect(session.canRedo()).toBe(true);
    });

    test('should invalidate the line holding the write', () => {
      session.writeByte(20, 0x01);

      const types = notifications.map(n => n.type);
      expect(types).toEqual([NotificationType.LINE_INVALIDATED, NotificationType.BUFFER_MODIFIED]);
      expect(notifications[0].metadata).toEqual({ lineIndex: 1 });
      expect(session.getLine(1)?.hasModifiedBytes).toBe(true);
      expect(session.getLine(0)?.hasModifiedBytes).toBe(false);
    });

    test('should come back clean when a byte is written back to its loaded value', () => {
      session.writeByte(10, 0xff);
      session.writeByte(10, 0x00);

      expect(session.isModified(10)).toBe(false);
      expect(session.getState().isDirty).toBe(false);
      expect(session.getLine(0)?.hasModifiedBytes).toBe(false);
    });

    test('should ignore out-of-range and unchanged writes', () => {
      expect(session.writeByte(64, 1)).toBe(false);
      expect(session.writeByte(5, 0)).toBe(false);
      expect(session.writeByte(5, 256)).toBe(false);
      expect(notifications).toEqual([]);
      expect(session.canUndo()).toBe(false);
    });

    test('should reject multi-byte writes past the end without partial writes', () => {
      const result = session.writeBytes(62, Buffer.from([1, 2, 3]));

      expect(!result.ok && result.error.kind).toBe(EditorErrorKind.OUT_OF_RANGE);
      expect(session.getBytes()).toEqual(Buffer.alloc(64));
    });

    test('should paste whole hex bytes at the cursor', () => {
      session.setCursor(4);
      const pasted = session.pasteHex('DE AD be ef');

      expect(pasted.ok && pasted.value).toBe(4);
      expect(session.getBytes()?.subarray(4, 8)).toEqual(Buffer.from([0xde, 0xad, 0xbe, 0xef]));
      expect(session.getState().statusMessage).toBe('Pasted 4 bytes');
    });

    test('should reject odd-length hex before writing', () => {
      const pasted = session.pasteHex('ABC', 0);

      expect(!pasted.ok && pasted.error.kind).toBe(EditorErrorKind.INVALID_PATTERN);
      expect(session.getState().isDirty).toBe(false);
      expect(session.getState().statusMessage).toBe('Hex input has an odd number of digits: "ABC"');
    });

    test('should fill and zero the selection as single undo steps', () => {
      session.select(8, 4);
      const filled = session.fillSelection(0xaa);

      expect(filled.ok && filled.value).toBe(4);
      expect(session.getSelectionBytes()).toEqual(Buffer.alloc(4, 0xaa));

      session.zeroSelection();
      expect(session.getSelectionBytes()).toEqual(Buffer.alloc(4));

      session.undo();
      expect(session.getSelectionBytes()).toEqual(Buffer.alloc(4, 0xaa));
      session.undo();
      expect(session.getState().isDirty).toBe(false);
    });

    test('should group edits in a transaction', () => {
      const result = session.transaction('Stamp', () => {
        session.writeByte(0, 1);
        session.writeByte(63, 2);
        return 2;
      });

      expect(result.ok && result.value).toBe(2);
      expect(session.getUndoStats()?.undoGroups).toBe(1);
      session.undo();
      expect(session.getState().statusMessage).toBe('Undo Stamp');
      expect(session.getBytes()).toEqual(Buffer.alloc(64));
    });
  });

  describe('Navigation', () => {
    beforeEach(() => {
      session.loadBytes(Buffer.alloc(64));
    });

    test('should clamp the cursor', () => {
      expect(session.setCursor(1000)).toBe(63);
      expect(session.setCursor(-5)).toBe(0);
    });

    test('should clamp selections', () => {
      expect(session.select(60, 10)).toEqual({ start: 60, length: 4 });
      expect(session.getCursor()).toBe(60);
      expect(session.selectAll()).toEqual({ start: 0, length: 64 });
    });

    test('should treat a non-finite selection length as empty', () => {
      expect(session.select(4, NaN)).toEqual({ start: 4, length: 0 });
      expect(session.fillSelection(0xaa)).toEqual({ ok: true, value: 0 });
      expect(session.getState().isDirty).toBe(false);
    });

    test('should go to hex and decimal offsets', () => {
      expect(session.goTo('0x20')).toBe(true);
      expect(session.getCursor()).toBe(32);
      expect(session.goTo('16')).toBe(true);
      expect(session.getCursor()).toBe(16);
    });

    test('should leave the cursor alone on bad input', () => {
      session.setCursor(5);
      expect(session.goTo('zz')).toBe(false);
      expect(session.getState().statusMessage).toBe('Invalid offset format');
      expect(session.goTo('0x40')).toBe(false);
      expect(session.getState().statusMessage).toBe('Offset 0x00000040 is beyond end of file');
      expect(session.getCursor()).toBe(5);
    });

    test('should emit cursor moves only on change', () => {
      notifications = [];
      session.setCursor(3);
      session.setCursor(3);
      expect(notifications.filter(n => n.type === NotificationType.CURSOR_MOVED)).toHaveLength(1);
    });
  });

  describe('Search and replace', () => {
    beforeEach(() => {
      session.loadBytes(deadBeefBuffer());
    });

    test('should search, select the first hit and cycle', () => {
      const found = session.search('DE AD');

      expect(found.ok && found.value.results.map(r => r.offset)).toEqual([10, 50, 90]);
      expect(session.getSelection()).toEqual({ start: 10, length: 2 });
      expect(session.getState().statusMessage).toBe('Found 3 matches');

      expect(session.findNext()?.offset).toBe(50);
      expect(session.findNext()?.offset).toBe(90);
      expect(session.findNext()?.offset).toBe(10);
      expect(session.findPrevious()?.offset).toBe(90);
    });

    test('should report the query mode', () => {
      session.search('DE ?? 00');
      const completed = notifications.find(n => n.type === NotificationType.SEARCH_COMPLETED);
      expect(completed?.metadata).toEqual({ query: 'DE ?? 00', mode: QueryMode.WILDCARD_HEX, count: 3, truncated: false });
    });

    test('should honour the configured result limit', () => {
      session.configure({ searchResultLimit: 2 });
      const found = session.search('DE AD');

      expect(found.ok && found.value.truncated).toBe(true);
      expect(session.getState().statusMessage).toBe('Found 2 matches (limited to 2)');
    });

    test('should replace exactly the matched offsets in one undo step', () => {
      session.search('DE AD');
      const replaced = session.replaceAll('BE EF');

      expect(replaced.ok && replaced.value).toEqual({ replaced: 3, skipped: 0 });
      const bytes = session.getBytes();
      for (const offset of [10, 50, 90]) {
        expect(bytes?.subarray(offset, offset + 2)).toEqual(Buffer.from([0xbe, 0xef]));
      }
      expect(session.getState().modifiedCount).toBe(6);
      expect(session.getState().searchResultCount).toBe(0);

      session.undo();
      expect(session.getBytes()).toEqual(deadBeefBuffer());
    });

    test('should search first when a query is passed to replaceAll', () => {
      const replaced = session.replaceAll('00 00', 'DE AD');
      expect(replaced.ok && replaced.value.replaced).toBe(3);
      expect(session.getBytes()).toEqual(Buffer.alloc(128));
    });

    test('should skip hits broken by an edit after the search', () => {
      session.loadBytes(Buffer.from([0xaa, 0xbb, 0x00, 0xaa, 0xbb]));
      session.search('AA BB');
      session.writeByte(3, 0x11);

      const replaced = session.replaceAll('CC DD');
      expect(replaced.ok && replaced.value).toEqual({ replaced: 1, skipped: 1 });
      expect(session.getBytes()).toEqual(Buffer.from([0xcc, 0xdd, 0x00, 0x11, 0xbb]));
      expect(session.getState().statusMessage).toBe('Replaced 1 occurrences, 1 skipped');
    });

    test('should replace inside an outer transaction', () => {
      const result = session.transaction('Rework', () => {
        session.writeByte(0, 0x01);
        return session.replaceAll('CC DD', 'DE AD');
      });

      expect(result.ok && result.value.ok && result.value.value.replaced).toBe(3);
      expect(session.getUndoStats()?.undoGroups).toBe(1);
      session.undo();
      expect(session.getBytes()).toEqual(deadBeefBuffer());
    });

    test('should reject a malformed replacement before writing', () => {
      session.search('DE AD');
      const replaced = session.replaceAll('XYZ');

      expect(!replaced.ok && replaced.error.kind).toBe(EditorErrorKind.INVALID_PATTERN);
      expect(session.getState().isDirty).toBe(false);
    });

    test('should reject an empty query', () => {
      const found = session.search('');
      expect(!found.ok && found.error.kind).toBe(EditorErrorKind.INVALID_PATTERN);
    });

    test('should report no matches', () => {
      const found = session.search('no such text');
      expect(found.ok && found.value.results).toEqual([]);
      expect(session.getState().statusMessage).toBe('No matches found');
      expect(session.findNext()).toBeNull();
    });
  });

  describe('Analysis', () => {
    test('should detect type and structures', async () => {
      const bytes = Buffer.alloc(2048);
      bytes.write('ANDROID!', 0, 'latin1');
      bytes.write('EFI PART', 1024, 'latin1');
      session.loadBytes(bytes);

      expect(session.detectFileType()).toEqual({ ok: true, value: 'Android Boot Image' });

      const tree = await session.analyzeStructure();
      expect(tree.ok && tree.value.children.map(c => c.name)).toEqual(['Android Boot Header', 'GPT Header']);
      expect(session.getState().statusMessage).toBe('Found 2 structures');
    });

    test('should extract strings with the configured minimum', () => {
      session.configure({ minStringLength: 6 });
      session.loadBytes(Buffer.from('\0short\0longer!\0', 'latin1'));

      const found = session.extractStrings();
      expect(found.ok && found.value.matches.map(m => m.previewText)).toEqual(['longer!']);
    });

    test('should load known patterns as search results', () => {
      const bytes = Buffer.alloc(32);
      bytes.set([0x7f, 0x45, 0x4c, 0x46], 16);
      session.loadBytes(bytes);

      const found = session.findKnownPatterns();
      expect(found.ok && found.value.results).toEqual([{ offset: 16, length: 4, previewText: 'ELF Magic' }]);
      expect(session.getSelection()).toEqual({ start: 16, length: 4 });
    });

    test('should inspect values at the cursor', () => {
      session.loadBytes(Buffer.from([0x00, 0x01, 0x02, 0x03, 0x04]));
      session.setCursor(1);

      const row = session.inspect();
      expect(row[DecodeKind.UINT16]).toBe('513');
      expect(row[DecodeKind.UINT64]).toBe('-');
    });

    test('should fail analysis without a buffer', async () => {
      expect(!session.computeChecksums().ok).toBe(true);
      const tree = await session.analyzeStructure();
      expect(!tree.ok && tree.error.kind).toBe(EditorErrorKind.NO_BUFFER);
      expect(session.writeByte(0, 1)).toBe(false);
      expect(session.undo()).toBe(false);
      expect(session.inspect()[DecodeKind.INT8]).toBe('-');
    });
  });

  describe('Bookmarks', () => {
    beforeEach(() => {
      session.loadBytes(Buffer.alloc(64));
      session.addBookmark('header', 'first', 20);
      session.addBookmark('table', '', 40);
    });

    test('should move between bookmarks', () => {
      expect(session.nextBookmark()?.name).toBe('header');
      expect(session.getCursor()).toBe(20);
      expect(session.nextBookmark()?.name).toBe('table');
      expect(session.nextBookmark()).toBeNull();
      expect(session.getCursor()).toBe(40);
      expect(session.previousBookmark()?.offset).toBe(20);
    });

    test('should reject bookmarks outside the buffer', () => {
      const added = session.addBookmark('far', '', 64);
      expect(!added.ok && added.error.kind).toBe(EditorErrorKind.OUT_OF_RANGE);
      expect(session.getState().bookmarkCount).toBe(2);
    });

    test('should clear bookmarks when a new buffer is loaded', () => {
      session.loadBytes(Buffer.alloc(8));
      expect(session.bookmarks.count).toBe(0);
    });
  });

  describe('Display', () => {
    test('should expose lines and follow bytesPerLine changes', () => {
      session.loadBytes(Buffer.alloc(64));
      expect(session.lineCount).toBe(4);

      notifications = [];
      session.configure({ bytesPerLine: 8 });
      expect(session.lineCount).toBe(8);
      expect(notifications.map(n => n.type)).toEqual([NotificationType.DISPLAY_INVALIDATED]);
      expect(session.getLines(6, 10).map(l => l.offsetText)).toEqual(['00000030', '00000038']);
    });

    test('should invalidate the whole display for large changes', () => {
      session.loadBytes(Buffer.alloc(4096));
      session.selectAll();
      notifications = [];
      session.fillSelection(1);

      const types = notifications.map(n => n.type);
      expect(types).toContain(NotificationType.DISPLAY_INVALIDATED);
      expect(types).not.toContain(NotificationType.LINE_INVALIDATED);
    });

    test('should return a frozen state snapshot', () => {
      const state = session.getState();
      expect(Object.isFrozen(state)).toBe(true);
      expect(state.isLoaded).toBe(false);
      expect(state.statusMessage).toBe('Ready');
    });
  });

  describe('File lifecycle', () => {
    test('should open, edit and save a file', async () => {
      const filePath = await testUtils.createTempFile(Buffer.from([1, 2, 3, 4]));

      const opened = await session.open(filePath);
      expect(opened).toEqual({ ok: true, value: true });
      expect(session.getState().filePath).toBe(filePath);
      expect(session.getState().statusMessage).toBe(`Loaded ${path.basename(filePath)} (4.00 B)`);

      session.writeByte(2, 0x99);
      const saved = await session.save();

      expect(saved).toEqual({ ok: true, value: true });
      expect(await testUtils.readFile(filePath)).toEqual(Buffer.from([1, 2, 0x99, 4]));
      expect(session.getState().isDirty).toBe(false);
      expect(session.getState().modifiedCount).toBe(0);
      expect(notifications.some(n => n.type === NotificationType.FILE_SAVED)).toBe(true);
    });

    test('should report a missing file', async () => {
      const missing = path.join(testUtils.tempRoot, 'missing.bin');
      const opened = await session.open(missing);

      expect(!opened.ok && opened.error.kind).toBe(EditorErrorKind.FILE_NOT_FOUND);
      const error = notifications.find(n => n.type === NotificationType.ERROR);
      expect(error?.message).toBe(`File not found: ${missing}`);
      expect(session.isLoaded).toBe(false);
    });

    test('should decline large files without a confirmation gate', async () => {
      session.configure({ largeFileThreshold: 16 });
      const filePath = await testUtils.createTempFile(Buffer.alloc(32));

      const opened = await session.open(filePath);
      expect(!opened.ok && opened.error.kind).toBe(EditorErrorKind.LOAD_DECLINED);
      expect(session.getState().statusMessage).toBe('Load cancelled');
    });

    test('should load large files when the gate agrees', async () => {
      const gated = new EditorSession({ config: { largeFileThreshold: 16 }, confirm: () => true });
      const filePath = await testUtils.createTempFile(Buffer.alloc(32));

      expect(await gated.open(filePath)).toEqual({ ok: true, value: true });
      expect(gated.size).toBe(32);
    });

    test('should keep a dirty buffer open without confirmation', async () => {
      session.loadBytes(Buffer.alloc(4));
      session.writeByte(0, 1);

      expect(await session.close()).toEqual({ ok: true, value: false });
      expect(session.isLoaded).toBe(true);

      expect(await session.close({ save: false })).toEqual({ ok: true, value: true });
      expect(session.isLoaded).toBe(false);
      expect(notifications.some(n => n.type === NotificationType.FILE_CLOSED)).toBe(true);
    });

    test('should ask the gate before discarding changes', async () => {
      const confirm = jest.fn(() => true);
      const gated = new EditorSession({ confirm });
      gated.loadBytes(Buffer.alloc(4), 'scratch.bin');
      gated.writeByte(0, 1);

      expect(await gated.close()).toEqual({ ok: true, value: true });
      expect(confirm).toHaveBeenCalledWith({
        reason: 'unsaved_changes',
        message: 'scratch.bin has unsaved changes. Discard them?',
        path: null,
        size: 4
      });
    });

    test('should save untitled buffers through the file picker', async () => {
      const target = testUtils.getTempFilePath();
      const picker: FilePicker = {
        pickOpenPath: async () => null,
        pickSavePath: jest.fn(async () => target)
      };
      const recentFiles = new RecentFiles({ storePath: testUtils.getTempFilePath('.txt') });
      const picked = new EditorSession({ filePicker: picker, recentFiles });
      picked.loadBytes(Buffer.from([5, 6]), 'scratch.bin');

      expect(await picked.save()).toEqual({ ok: true, value: true });
      expect(picker.pickSavePath).toHaveBeenCalledWith('Save File As', 'scratch.bin');
      expect(await testUtils.readFile(target)).toEqual(Buffer.from([5, 6]));
      expect(picked.getState().filePath).toBe(target);
      expect(recentFiles.list()).toEqual([target]);
    });

    test('should apply the recent files limit', async () => {
      const recentFiles = new RecentFiles({ storePath: testUtils.getTempFilePath('.txt') });
      const tracked = new EditorSession({ recentFiles });
      const first = await testUtils.createTempFile(Buffer.from([1]));
      const second = await testUtils.createTempFile(Buffer.from([2]));

      await tracked.open(first);
      await tracked.open(second);
      expect(recentFiles.list()).toEqual([second, first]);

      tracked.configure({ recentFilesLimit: 1 });
      expect(recentFiles.list()).toEqual([second]);
    });

    test('should treat a cancelled picker as no-op', async () => {
      session.loadBytes(Buffer.alloc(2));
      expect(await session.saveAs()).toEqual({ ok: true, value: false });
      expect(await session.open()).toEqual({ ok: true, value: false });
    });

    test('should export hex dump and selection', async () => {
      session.loadBytes(Buffer.from('0123456789'), 'digits.bin');
      const dumpPath = testUtils.getTempFilePath('.txt');

      expect(await session.exportHexDump(dumpPath)).toEqual({ ok: true, value: true });
      const dump = await testUtils.readFile(dumpPath, 'utf8');
      expect(dump.split('\n')[0]).toBe('Hex Dump of: digits.bin');
      expect(dump.split('\n')[2]).toBe('Generated: 2024-01-01T00:00:00.000Z');

      const noSelection = await session.exportSelection(testUtils.getTempFilePath());
      expect(!noSelection.ok && noSelection.error.kind).toBe(EditorErrorKind.OUT_OF_RANGE);

      session.select(2, 3);
      const selectionPath = testUtils.getTempFilePath();
      expect(await session.exportSelection(selectionPath)).toEqual({ ok: true, value: true });
      expect(await testUtils.readFile(selectionPath, 'utf8')).toBe('234');
    });

    test('should compare with another file and move to the first difference', async () => {
      session.loadBytes(Buffer.from([1, 2, 3, 4]));
      const other = await testUtils.createTempFile(Buffer.from([1, 2, 9, 4, 5]));

      const compared = await session.compareWith(other);
      expect(compared.ok && compared.value?.differences).toEqual([2]);
      expect(compared.ok && compared.value?.sizeMismatch).toBe(true);
      expect(session.getCursor()).toBe(2);
      expect(session.getState().statusMessage).toBe('First difference at offset 0x00000002');
    });

    test('should apply a patch file as one undo step', async () => {
      session.loadBytes(Buffer.from([0x00, 0x11, 0x22, 0x33]));
      const patchPath = await testUtils.createTempFile('# test\n0x1:11:AA:one\n0x3:00:BB:stale\n', '.patch');

      const applied = await session.applyPatchFile(patchPath);
      expect(applied.ok && applied.value.applied).toBe(1);
      expect(applied.ok && applied.value.rejected).toBe(1);
      expect(session.getBytes()).toEqual(Buffer.from([0x00, 0xaa, 0x22, 0x33]));
      expect(session.getState().statusMessage).toBe('Applied 1 patches, 1 rejected');

      session.undo();
      expect(session.getBytes()).toEqual(Buffer.from([0x00, 0x11, 0x22, 0x33]));
    });
  });

  test('should isolate listener failures', () => {
    const logged: unknown[] = [];
    const quiet = new EditorSession({
      logger: { debug: () => undefined, info: () => undefined, warn: () => undefined, error: (...args) => logged.push(...args) }
    });
    quiet.subscribe(() => {
      throw new Error('listener broke');
    });
    const received: NotificationType[] = [];
    quiet.subscribe(n => received.push(n.type));

    quiet.loadBytes(Buffer.alloc(1));

    expect(received).toEqual([NotificationType.FILE_LOADED, NotificationType.STATUS]);
    expect(logged[0]).toBe('Notification listener error:');
  });
});
