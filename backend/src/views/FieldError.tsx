import React from 'react';

const FieldError: React.FC<{ message?: string }> = ({ message }) =>
    message ? <div className="field-error">{message}</div> : null;

export default FieldError;
