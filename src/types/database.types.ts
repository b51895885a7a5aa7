// Row shapes as persisted (column names match the schema)

export interface ConversationRecord {
  id: number;
  call_sid: string;
  phone_number: string | null;
  start_time: string;
  end_time: string | null;
  duration_seconds: number | null;
  total_user_messages: number | null;
  total_assistant_messages: number | null;
  created_at: string;
}

export interface MessageRecord {
  id: number;
  conversation_id: number;
  role: string;
  content: string;
  confidence: number | null;
  timestamp: string;
  created_at: string;
}

export interface AnalysisRow {
  id: number;
  conversation_id: number;
  resumen: string | null;
  sentimiento: string | null;
  sentimiento_detalle: string | null;
  interes_cliente: string | null;
  nivel_interes: number | null;
  calificacion_lead: string | null;
  proximos_pasos: string | null;
  propiedades_mencionadas: string | null;
  puntos_clave: string | null;
  created_at: string;
}

export interface FollowUpScriptRecord {
  id: number;
  conversation_id: number;
  script_content: string;
  enviado: number | null;
  fecha_envio: string | null;
  created_at: string;
}

/** Row of the leads_calientes view */
export interface HotLeadRow {
  conversation_id: number;
  call_sid: string;
  phone_number: string | null;
  start_time: string;
  duration_seconds: number | null;
  resumen: string | null;
  sentimiento: string | null;
  nivel_interes: number | null;
  calificacion_lead: string;
  interes_cliente: string | null;
  proximos_pasos: string | null;
}

/** Row of the estadisticas_conversaciones view */
export interface DailyStatisticsRow {
  fecha: string;
  total_conversaciones: number;
  duracion_promedio: number | null;
  total_mensajes: number | null;
  leads_calientes: number;
  leads_tibios: number;
  leads_frios: number;
  interes_promedio: number | null;
}
