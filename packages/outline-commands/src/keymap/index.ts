export {
  editorCommandDescriptors,
  matchEditorCommand,
  normaliseStroke,
  textInputFor,
  type EditorCommandBinding,
  type EditorCommandCategory,
  type EditorCommandDescriptor,
  type EditorCommandId,
  type EditorCommandMatch,
  type EditorKeyStroke,
  type EditorKeyStrokeInit,
  type EditorMode
} from "./editorCommands";
