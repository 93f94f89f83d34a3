import React, { createContext, useContext, useReducer, useCallback, useRef, ReactNode } from 'react';
import { toast } from 'sonner';
import type { RgbaImage } from '@/lib/canvas/types';
import { createLayer, strokeName } from '@/lib/canvas/layerUtils';
import { layerToPngDataUrl } from '@/lib/canvas/renderCache';
import * as editorApi from '@/services/editorApi';
import type { EditorView } from '@/validation/api.zod';
import { editorReducer, initialState, type EditorAction, type EditorState } from './editorReducer';

// Context
interface EditorContextType {
  state: EditorState;
  dispatch: React.Dispatch<EditorAction>;

  // Helper actions
  loadInitial: () => Promise<void>;
  goNext: () => Promise<void>;
  goPrevious: () => Promise<void>;
  jumpTo: (name: string) => Promise<void>;
  save: () => Promise<void>;
  addStroke: (image: RgbaImage) => void;
  clearStrokes: () => void;
  setBrushColor: (color: string) => void;
  setBrushSize: (size: number) => void;
  setFilenameDraft: (name: string) => void;
}

const EditorContext = createContext<EditorContextType | null>(null);

export function EditorProvider({ children }: { children: ReactNode }) {
  const [state, dispatch] = useReducer(editorReducer, initialState);

  // Read by the async actions so they always upload the latest strokes
  const stateRef = useRef(state);
  stateRef.current = state;

  const runAction = useCallback(async (label: string, action: () => Promise<void>) => {
    if (stateRef.current.isProcessing) return;

    dispatch({ type: 'SET_PROCESSING', payload: true });
    try {
      await action();
    } catch (e) {
      const message = e instanceof Error ? e.message : 'Unknown error';
      dispatch({ type: 'SET_STATUS_MESSAGE', payload: `${label} failed: ${message}` });
      toast.error(`${label} failed`, { description: message });
      console.error(e);
    } finally {
      dispatch({ type: 'SET_PROCESSING', payload: false });
    }
  }, []);

  const showView = useCallback((view: EditorView) => {
    dispatch({ type: 'SET_VIEW', payload: view });
  }, []);

  const loadInitial = useCallback(
    () =>
      runAction('Loading', async () => {
        const [view, filenames] = await Promise.all([editorApi.fetchView(), editorApi.fetchImageList()]);
        dispatch({ type: 'SET_FILENAMES', payload: filenames });
        showView(view);
      }),
    [runAction, showView]
  );

  const goNext = useCallback(
    () => runAction('Next image', async () => showView(await editorApi.goNext())),
    [runAction, showView]
  );

  const goPrevious = useCallback(
    () => runAction('Previous image', async () => showView(await editorApi.goPrevious())),
    [runAction, showView]
  );

  const jumpTo = useCallback(
    (name: string) =>
      runAction('Open image', async () => {
        const { view, matched } = await editorApi.jumpTo(name.trim());
        showView(view);
        if (!matched) {
          toast.warning('Image not found', { description: name });
        }
      }),
    [runAction, showView]
  );

  const save = useCallback(
    () =>
      runAction('Save', async () => {
        const layers = stateRef.current.layers.map(layerToPngDataUrl);
        const result = await editorApi.saveScribbles(layers);
        dispatch({ type: 'SET_SAVE_RESULT', payload: { view: result.view, message: result.message } });
        if (result.saved) {
          toast.success('Scribbles saved', { description: result.view.filename });
        } else {
          toast(result.message);
        }
      }),
    [runAction]
  );

  const addStroke = useCallback((image: RgbaImage) => {
    const layer = createLayer(image, strokeName(stateRef.current.layers));
    dispatch({ type: 'ADD_LAYER', payload: layer });
  }, []);

  const clearStrokes = useCallback(() => {
    dispatch({ type: 'CLEAR_LAYERS' });
  }, []);

  const setBrushColor = useCallback((color: string) => {
    dispatch({ type: 'SET_BRUSH_COLOR', payload: color });
  }, []);

  const setBrushSize = useCallback((size: number) => {
    dispatch({ type: 'SET_BRUSH_SIZE', payload: size });
  }, []);

  const setFilenameDraft = useCallback((name: string) => {
    dispatch({ type: 'SET_FILENAME_DRAFT', payload: name });
  }, []);

  return (
    <EditorContext.Provider value={{
      state,
      dispatch,
      loadInitial,
      goNext,
      goPrevious,
      jumpTo,
      save,
      addStroke,
      clearStrokes,
      setBrushColor,
      setBrushSize,
      setFilenameDraft,
    }}>
      {children}
    </EditorContext.Provider>
  );
}

export function useEditor() {
  const context = useContext(EditorContext);
  if (!context) {
    throw new Error('useEditor must be used within EditorProvider');
  }
  return context;
}
