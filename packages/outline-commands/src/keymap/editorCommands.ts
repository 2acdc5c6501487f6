/**
 * Key binding schema for the modal editor. Each descriptor names the modes it is active in;
 * the session resolves a keystroke to at most one command for the current mode.
 */

export type EditorMode = "command" | "insert";

export type EditorCommandId =
  | "cursor.left"
  | "cursor.right"
  | "cursor.down"
  | "cursor.up"
  | "cursor.wordBack"
  | "cursor.wordNext"
  | "cursor.wordEnd"
  | "mode.insertBefore"
  | "mode.appendToEnd"
  | "bullet.openBelow"
  | "bullet.openAbove"
  | "bullet.delete"
  | "bullet.yank"
  | "bullet.pasteBelow"
  | "bullet.pasteAbove"
  | "bullet.indent"
  | "bullet.unindent"
  | "history.undo"
  | "insert.indent"
  | "insert.unindent"
  | "insert.newBullet"
  | "insert.backspace"
  | "insert.exit"
  | "editor.quit";

export type EditorCommandCategory =
  | "navigation"
  | "editing"
  | "structure"
  | "destructive"
  | "session";

type EditorKeyModifier = "alt" | "ctrl" | "shift";

type EditorModifierState = Record<EditorKeyModifier, boolean>;

export interface EditorCommandBinding {
  readonly key: string;
  readonly modifiers: EditorModifierState;
}

export interface EditorCommandDescriptor {
  readonly id: EditorCommandId;
  readonly description: string;
  readonly category: EditorCommandCategory;
  readonly modes: readonly EditorMode[];
  /** Operator commands run on the second consecutive press of their key (`dd`, `yy`). */
  readonly operator?: boolean;
  readonly bindings: readonly EditorCommandBinding[];
}

export interface EditorCommandMatch {
  readonly descriptor: EditorCommandDescriptor;
  readonly binding: EditorCommandBinding;
}

export interface EditorKeyStrokeInit {
  readonly key: string;
  readonly altKey?: boolean;
  readonly ctrlKey?: boolean;
  readonly shiftKey?: boolean;
}

export interface EditorKeyStroke {
  readonly key: string;
  readonly altKey: boolean;
  readonly ctrlKey: boolean;
  readonly shiftKey: boolean;
}

const DEFAULT_MODIFIER_STATE: EditorModifierState = {
  alt: false,
  ctrl: false,
  shift: false
};

const BOTH_MODES: readonly EditorMode[] = ["command", "insert"];
const COMMAND_MODE: readonly EditorMode[] = ["command"];
const INSERT_MODE: readonly EditorMode[] = ["insert"];

const createBinding = (key: string, modifiers: Partial<EditorModifierState> = {}): EditorCommandBinding => ({
  key,
  modifiers: { ...DEFAULT_MODIFIER_STATE, ...modifiers }
});

export const normaliseStroke = (stroke: EditorKeyStrokeInit): EditorKeyStroke => ({
  key: stroke.key,
  altKey: Boolean(stroke.altKey),
  ctrlKey: Boolean(stroke.ctrlKey),
  shiftKey: Boolean(stroke.shiftKey)
});

const bindingMatchesStroke = (binding: EditorCommandBinding, stroke: EditorKeyStroke): boolean => {
  if (stroke.key !== binding.key) {
    return false;
  }
  const { modifiers } = binding;
  return (
    modifiers.alt === stroke.altKey
    && modifiers.ctrl === stroke.ctrlKey
    && modifiers.shift === stroke.shiftKey
  );
};

const bindingPriority = (binding: EditorCommandBinding): number => {
  let priority = 0;
  if (binding.modifiers.shift) {
    priority += 4;
  }
  if (binding.modifiers.ctrl) {
    priority += 2;
  }
  if (binding.modifiers.alt) {
    priority += 1;
  }
  return priority;
};

export const editorCommandDescriptors: readonly EditorCommandDescriptor[] = [
  {
    id: "cursor.left",
    category: "navigation",
    description: "Move to the previous character, wrapping onto earlier rows",
    modes: COMMAND_MODE,
    bindings: [createBinding("h")]
  },
  {
    id: "cursor.right",
    category: "navigation",
    description: "Move to the next character, wrapping onto later rows",
    modes: COMMAND_MODE,
    bindings: [createBinding("l")]
  },
  {
    id: "cursor.down",
    category: "navigation",
    description: "Move one row down, keeping the remembered column",
    modes: COMMAND_MODE,
    bindings: [createBinding("j")]
  },
  {
    id: "cursor.up",
    category: "navigation",
    description: "Move one row up, keeping the remembered column",
    modes: COMMAND_MODE,
    bindings: [createBinding("k")]
  },
  {
    id: "cursor.wordBack",
    category: "navigation",
    description: "Move to the start of the previous word",
    modes: COMMAND_MODE,
    bindings: [createBinding("b")]
  },
  {
    id: "cursor.wordNext",
    category: "navigation",
    description: "Move to the start of the next word",
    modes: COMMAND_MODE,
    bindings: [createBinding("w")]
  },
  {
    id: "cursor.wordEnd",
    category: "navigation",
    description: "Move to the end of the current or next word",
    modes: COMMAND_MODE,
    bindings: [createBinding("e")]
  },
  {
    id: "mode.insertBefore",
    category: "editing",
    description: "Insert before the character under the cursor",
    modes: COMMAND_MODE,
    bindings: [createBinding("i")]
  },
  {
    id: "mode.appendToEnd",
    category: "editing",
    description: "Insert at the end of the bullet",
    modes: COMMAND_MODE,
    bindings: [createBinding("A")]
  },
  {
    id: "bullet.openBelow",
    category: "editing",
    description: "Open a new bullet below and start inserting",
    modes: COMMAND_MODE,
    bindings: [createBinding("o")]
  },
  {
    id: "bullet.openAbove",
    category: "editing",
    description: "Open a new bullet above and start inserting",
    modes: COMMAND_MODE,
    bindings: [createBinding("O")]
  },
  {
    id: "bullet.delete",
    category: "destructive",
    description: "Delete the bullet under the cursor with its children",
    modes: COMMAND_MODE,
    operator: true,
    bindings: [createBinding("d")]
  },
  {
    id: "bullet.yank",
    category: "editing",
    description: "Copy the bullet under the cursor with its children",
    modes: COMMAND_MODE,
    operator: true,
    bindings: [createBinding("y")]
  },
  {
    id: "bullet.pasteBelow",
    category: "editing",
    description: "Paste the clipboard below the bullet under the cursor",
    modes: COMMAND_MODE,
    bindings: [createBinding("p")]
  },
  {
    id: "bullet.pasteAbove",
    category: "editing",
    description: "Paste the clipboard above the bullet under the cursor",
    modes: COMMAND_MODE,
    bindings: [createBinding("P")]
  },
  {
    id: "bullet.indent",
    category: "structure",
    description: "Indent the bullet under the cursor",
    modes: COMMAND_MODE,
    bindings: [createBinding(">")]
  },
  {
    id: "bullet.unindent",
    category: "structure",
    description: "Unindent the bullet under the cursor",
    modes: COMMAND_MODE,
    bindings: [createBinding("<")]
  },
  {
    id: "history.undo",
    category: "destructive",
    description: "Restore the most recently deleted bullet",
    modes: COMMAND_MODE,
    bindings: [createBinding("u")]
  },
  {
    id: "insert.indent",
    category: "structure",
    description: "Indent the bullet being edited",
    modes: INSERT_MODE,
    bindings: [createBinding("Tab")]
  },
  {
    id: "insert.unindent",
    category: "structure",
    description: "Unindent the bullet being edited",
    modes: INSERT_MODE,
    bindings: [createBinding("Tab", { shift: true })]
  },
  {
    id: "insert.newBullet",
    category: "editing",
    description: "Start a new bullet below the one being edited",
    modes: INSERT_MODE,
    bindings: [createBinding("Enter")]
  },
  {
    id: "insert.backspace",
    category: "editing",
    description: "Delete the character before the cursor",
    modes: INSERT_MODE,
    bindings: [createBinding("Backspace")]
  },
  {
    id: "insert.exit",
    category: "session",
    description: "Return to command mode",
    modes: INSERT_MODE,
    bindings: [createBinding("Escape"), createBinding("c", { ctrl: true })]
  },
  {
    id: "editor.quit",
    category: "session",
    description: "Quit the editor",
    modes: BOTH_MODES,
    bindings: [createBinding("q", { ctrl: true })]
  }
] as const satisfies readonly EditorCommandDescriptor[];

export const matchEditorCommand = (
  mode: EditorMode,
  strokeInit: EditorKeyStrokeInit,
  descriptors: readonly EditorCommandDescriptor[] = editorCommandDescriptors
): EditorCommandMatch | null => {
  const stroke = normaliseStroke(strokeInit);
  const matches: Array<{
    descriptor: EditorCommandDescriptor;
    binding: EditorCommandBinding;
    descriptorIndex: number;
    priority: number;
  }> = [];

  descriptors.forEach((descriptor, descriptorIndex) => {
    if (!descriptor.modes.includes(mode)) {
      return;
    }
    descriptor.bindings.forEach((binding) => {
      if (!bindingMatchesStroke(binding, stroke)) {
        return;
      }
      matches.push({
        descriptor,
        binding,
        descriptorIndex,
        priority: bindingPriority(binding)
      });
    });
  });

  if (matches.length === 0) {
    return null;
  }

  matches.sort((left, right) => {
    if (left.priority !== right.priority) {
      return right.priority - left.priority;
    }
    return left.descriptorIndex - right.descriptorIndex;
  });

  const [best] = matches;
  return {
    descriptor: best.descriptor,
    binding: best.binding
  } satisfies EditorCommandMatch;
};

/**
 * The text a keystroke types in insert mode, or `null` for control keys and chords.
 */
export const textInputFor = (strokeInit: EditorKeyStrokeInit): string | null => {
  const stroke = normaliseStroke(strokeInit);
  if (stroke.ctrlKey || stroke.altKey) {
    return null;
  }
  return Array.from(stroke.key).length === 1 ? stroke.key : null;
};
