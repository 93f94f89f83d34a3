import type { BrushState, Layer } from '@/lib/canvas/types';
import { BRUSH_COLORS, DEFAULT_BRUSH_SIZE, MAX_BRUSH_SIZE, MIN_BRUSH_SIZE } from '@/lib/canvas/constants';
import type { EditorView } from '@/validation/api.zod';

// State types
export interface EditorState {
  view: EditorView | null;
  filenames: string[];
  /** Text in the filename field; submitted as a jump */
  filenameDraft: string;
  layers: Layer[];
  brush: BrushState;
  isProcessing: boolean;
  /** Outcome of the last save (or the last failure) */
  statusMessage: string;
}

// Action types
export type EditorAction =
  | { type: 'SET_VIEW'; payload: EditorView }
  | { type: 'SET_SAVE_RESULT'; payload: { view: EditorView; message: string } }
  | { type: 'SET_FILENAMES'; payload: string[] }
  | { type: 'SET_FILENAME_DRAFT'; payload: string }
  | { type: 'ADD_LAYER'; payload: Layer }
  | { type: 'CLEAR_LAYERS' }
  | { type: 'SET_BRUSH_COLOR'; payload: string }
  | { type: 'SET_BRUSH_SIZE'; payload: number }
  | { type: 'SET_PROCESSING'; payload: boolean }
  | { type: 'SET_STATUS_MESSAGE'; payload: string };

export const initialState: EditorState = {
  view: null,
  filenames: [],
  filenameDraft: '',
  layers: [],
  brush: {
    color: BRUSH_COLORS[0],
    size: DEFAULT_BRUSH_SIZE,
  },
  isProcessing: false,
  statusMessage: '',
};

export function isBrushColor(color: string): boolean {
  return BRUSH_COLORS.some((c) => c.toLowerCase() === color.toLowerCase());
}

// Reducer
export function editorReducer(state: EditorState, action: EditorAction): EditorState {
  switch (action.type) {
    case 'SET_VIEW':
      // A new view means a new (or reloaded) image: strokes do not carry over
      return {
        ...state,
        view: action.payload,
        filenameDraft: action.payload.filename,
        layers: [],
      };

    case 'SET_SAVE_RESULT':
      return {
        ...state,
        view: action.payload.view,
        statusMessage: action.payload.message,
      };

    case 'SET_FILENAMES':
      return { ...state, filenames: action.payload };

    case 'SET_FILENAME_DRAFT':
      return { ...state, filenameDraft: action.payload };

    case 'ADD_LAYER':
      return { ...state, layers: [...state.layers, action.payload] };

    case 'CLEAR_LAYERS':
      return { ...state, layers: [] };

    case 'SET_BRUSH_COLOR':
      if (!isBrushColor(action.payload)) return state;
      return { ...state, brush: { ...state.brush, color: action.payload } };

    case 'SET_BRUSH_SIZE':
      return {
        ...state,
        brush: {
          ...state.brush,
          size: Math.max(MIN_BRUSH_SIZE, Math.min(MAX_BRUSH_SIZE, Math.round(action.payload))),
        },
      };

    case 'SET_PROCESSING':
      return { ...state, isProcessing: action.payload };

    case 'SET_STATUS_MESSAGE':
      return { ...state, statusMessage: action.payload };

    default:
      return state;
  }
}
